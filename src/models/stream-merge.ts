/**
 * Folds stream events into a {@link MessagesResponse}.
 *
 * `message_start` and `message_delta` carry authoritative values that replace
 * what the response holds; `content_block_delta` accumulates into the block at
 * its index. Each event has exactly one effect, so the state after N events is
 * a left fold over those N events. Events are applied in arrival order and
 * indices are trusted as sent.
 */

import { UnsupportedOperationError } from '../errors.js'
import { TextBlock, ThinkingBlock, type ContentBlock } from '../types/messages.js'
import { MessagesResponse } from '../types/response.js'
import { mergeUsage, type ContentBlockDelta, type StreamEvent } from './streaming.js'

/**
 * What applying one event did to the response.
 *
 * - `applied` - the response changed (or the event is a stream-state marker)
 * - `ignored` - the event has no effect by definition (ping, block stop, duplicate start)
 * - `anomaly` - the event could not be applied; the response is unchanged
 */
export type MergeOutcome = { type: 'applied' } | { type: 'ignored' } | { type: 'anomaly'; message: string }

const APPLIED: MergeOutcome = { type: 'applied' }
const IGNORED: MergeOutcome = { type: 'ignored' }

/**
 * Applies one stream event to a response in place.
 *
 * `message_stop` and `error` leave the response untouched; the stream handle
 * reacts to them.
 *
 * @param response - Response being accumulated
 * @param event - The next event
 * @returns The outcome of the merge
 * @throws \{UnsupportedOperationError\} When a delta targets a tool use block
 */
export function mergeStreamEvent(response: MessagesResponse, event: StreamEvent): MergeOutcome {
  switch (event.type) {
    case 'message_start': {
      const snapshot = event.message
      response.id = snapshot.id
      response.model = snapshot.model
      response.role = snapshot.role
      response.content = [...snapshot.content]
      response.stopReason = snapshot.stopReason
      response.stopSequence = snapshot.stopSequence
      response.usage = { ...snapshot.usage }
      return APPLIED
    }

    case 'content_block_start': {
      // A block already at this index means the start was delivered twice
      if (response.content.length > event.index) {
        return IGNORED
      }
      response.content.push(event.contentBlock)
      return APPLIED
    }

    case 'content_block_delta': {
      const block = response.content[event.index]
      if (block === undefined) {
        return {
          type: 'anomaly',
          message: `${event.delta.type} for index ${event.index} arrived before its content block`,
        }
      }
      const merged = applyDelta(block, event.delta)
      if (merged === undefined) {
        return {
          type: 'anomaly',
          message: `${event.delta.type} does not apply to ${block.type} block at index ${event.index}`,
        }
      }
      response.content[event.index] = merged
      return APPLIED
    }

    case 'message_delta': {
      response.stopReason = event.delta.stopReason
      response.stopSequence = event.delta.stopSequence
      response.usage = mergeUsage(response.usage, event.usage)
      return APPLIED
    }

    case 'message_stop':
    case 'error':
      return APPLIED

    case 'content_block_stop':
    case 'ping':
      return IGNORED
  }
}

/**
 * Combines a block with a delta of the same kind.
 *
 * @returns The merged block, or undefined when the kinds do not pair
 */
function applyDelta(block: ContentBlock, delta: ContentBlockDelta): ContentBlock | undefined {
  switch (block.type) {
    case 'text':
      if (delta.type === 'text_delta') {
        return new TextBlock({ text: block.text + delta.text, cacheControl: block.cacheControl })
      }
      return undefined

    case 'thinking':
      if (delta.type === 'thinking_delta') {
        return new ThinkingBlock({ thinking: block.thinking + delta.thinking, signature: block.signature })
      }
      if (delta.type === 'signature_delta') {
        return new ThinkingBlock({ thinking: block.thinking, signature: delta.signature })
      }
      return undefined

    case 'tool_use':
      // TODO: accumulate input_json_delta fragments and parse them at content_block_stop
      throw new UnsupportedOperationError(
        `Streaming ${delta.type} into tool_use block '${block.name}' (${block.id}) is not supported`
      )

    case 'image':
    case 'tool_result':
      return undefined
  }
}

/**
 * Replays a sequence of events into a fresh response.
 *
 * @param events - Events in arrival order
 * @returns The accumulated response
 */
export function foldStreamEvents(events: Iterable<StreamEvent>): MessagesResponse {
  const response = new MessagesResponse()
  for (const event of events) {
    mergeStreamEvent(response, event)
  }
  return response
}
