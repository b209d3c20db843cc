import type { ContentBlock, StopReason } from '../types/messages.js'
import type { MessagesResponse } from '../types/response.js'

/**
 * Stream event types for the Messages API.
 *
 * Events arrive per content block as start, zero or more deltas, then stop,
 * with increasing indices, and the stream ends with exactly one
 * `message_stop`.
 */

/**
 * Union type representing all possible streaming events.
 * This is a discriminated union where each event has a unique type field.
 */
export type StreamEvent =
  | MessageStartEvent
  | ContentBlockStartEvent
  | ContentBlockDeltaEvent
  | ContentBlockStopEvent
  | MessageDeltaEvent
  | MessageStopEvent
  | PingEvent
  | ErrorEvent

/**
 * Opens the message with a full snapshot of the response.
 */
export interface MessageStartEvent {
  type: 'message_start'

  /**
   * Initial response skeleton. Usually has empty content.
   */
  message: MessagesResponse
}

/**
 * Announces a new content block at `index`.
 */
export interface ContentBlockStartEvent {
  type: 'content_block_start'
  index: number

  /**
   * Initial block, e.g. a text block with empty text.
   */
  contentBlock: ContentBlock
}

/**
 * Extends the content block at `index`.
 */
export interface ContentBlockDeltaEvent {
  type: 'content_block_delta'
  index: number
  delta: ContentBlockDelta
}

/**
 * Marks the content block at `index` as complete.
 */
export interface ContentBlockStopEvent {
  type: 'content_block_stop'
  index: number
}

/**
 * Carries top-level changes to the message.
 */
export interface MessageDeltaEvent {
  type: 'message_delta'
  delta: {
    stopReason?: StopReason
    stopSequence?: string
  }

  /**
   * Token counts accrued since the previous usage report.
   */
  usage: Usage
}

/**
 * Final event of a stream.
 */
export interface MessageStopEvent {
  type: 'message_stop'
}

/**
 * Keep-alive.
 */
export interface PingEvent {
  type: 'ping'
}

/**
 * Error reported inside the event stream.
 */
export interface ErrorEvent {
  type: 'error'
  error: {
    type: string
    message: string
  }
}

/**
 * A delta (incremental chunk) of content within a content block.
 */
export type ContentBlockDelta = TextDelta | ThinkingDelta | SignatureDelta | InputJsonDelta

/**
 * Incremental text for a text block.
 */
export interface TextDelta {
  type: 'text_delta'
  text: string
}

/**
 * Incremental reasoning for a thinking block.
 */
export interface ThinkingDelta {
  type: 'thinking_delta'
  thinking: string
}

/**
 * Signature that completes a thinking block.
 */
export interface SignatureDelta {
  type: 'signature_delta'
  signature: string
}

/**
 * Partial JSON for a tool use block's input.
 */
export interface InputJsonDelta {
  type: 'input_json_delta'
  partialJson: string
}

/**
 * Token usage statistics. Counters the API has not reported yet are absent.
 */
export interface Usage {
  /**
   * Number of tokens in the input (prompt).
   */
  inputTokens?: number

  /**
   * Number of tokens in the output (completion).
   */
  outputTokens?: number

  /**
   * Number of input tokens written to the prompt cache.
   */
  cacheCreationInputTokens?: number

  /**
   * Number of input tokens read from the prompt cache.
   */
  cacheReadInputTokens?: number
}

const USAGE_FIELDS = [
  'inputTokens',
  'outputTokens',
  'cacheCreationInputTokens',
  'cacheReadInputTokens',
] as const satisfies readonly (keyof Usage)[]

/**
 * Adds two usage reports field by field.
 *
 * A field present on either side is summed with absent treated as zero; a
 * field absent on both sides stays absent. The operation is associative and
 * `{}` is its identity.
 *
 * @param a - First usage
 * @param b - Second usage
 * @returns A new usage object
 */
export function mergeUsage(a: Usage, b: Usage): Usage {
  const merged: Usage = {}
  for (const field of USAGE_FIELDS) {
    const left = a[field]
    const right = b[field]
    if (left !== undefined || right !== undefined) {
      merged[field] = (left ?? 0) + (right ?? 0)
    }
  }
  return merged
}
