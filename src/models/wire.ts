/**
 * Wire format of the Messages API.
 *
 * Inbound bodies (responses, stream events, error bodies) are validated with
 * zod before they are mapped to SDK types, so a payload that does not match a
 * known shape surfaces as a {@link ResponseParseError} instead of a
 * half-populated object. Outbound blocks are formatted to the snake_case
 * field names the API expects.
 */

import { z } from 'zod'
import { ResponseParseError } from '../errors.js'
import {
  ImageBlock,
  TextBlock,
  ThinkingBlock,
  ToolResultBlock,
  ToolUseBlock,
  type ContentBlock,
  type Message,
  type StopReason,
} from '../types/messages.js'
import { jsonValueSchema } from '../types/json.js'
import { MessagesResponse } from '../types/response.js'
import type { ContentBlockDelta, StreamEvent, Usage } from './streaming.js'

/**
 * Stop reasons this client understands.
 */
const STOP_REASONS: readonly StopReason[] = ['end_turn', 'max_tokens', 'stop_sequence', 'tool_use']

const cacheControlSchema = z.object({ type: z.literal('ephemeral') })

const contentBlockSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('text'),
    text: z.string(),
    cache_control: cacheControlSchema.nullish(),
  }),
  z.object({
    type: z.literal('image'),
    source: z.object({
      type: z.literal('base64'),
      media_type: z.string(),
      data: z.string(),
    }),
  }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: jsonValueSchema,
  }),
  z.object({
    type: z.literal('tool_result'),
    tool_use_id: z.string(),
    content: z.string(),
    is_error: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('thinking'),
    thinking: z.string(),
    signature: z.string().nullish(),
  }),
])

const usageSchema = z.object({
  input_tokens: z.number().int().nullish(),
  output_tokens: z.number().int().nullish(),
  cache_creation_input_tokens: z.number().int().nullish(),
  cache_read_input_tokens: z.number().int().nullish(),
})

const messagesResponseSchema = z.object({
  id: z.string(),
  type: z.literal('message').optional(),
  role: z.enum(['user', 'assistant']),
  model: z.string(),
  content: z.array(contentBlockSchema),
  stop_reason: z.string().nullish(),
  stop_sequence: z.string().nullish(),
  usage: usageSchema.optional(),
})

const deltaSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text_delta'), text: z.string() }),
  z.object({ type: z.literal('thinking_delta'), thinking: z.string() }),
  z.object({ type: z.literal('signature_delta'), signature: z.string() }),
  z.object({ type: z.literal('input_json_delta'), partial_json: z.string() }),
])

const errorDetailSchema = z.object({
  type: z.string(),
  message: z.string(),
})

const streamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message_start'), message: messagesResponseSchema }),
  z.object({
    type: z.literal('content_block_start'),
    index: z.number().int().nonnegative(),
    content_block: contentBlockSchema,
  }),
  z.object({
    type: z.literal('content_block_delta'),
    index: z.number().int().nonnegative(),
    delta: deltaSchema,
  }),
  z.object({ type: z.literal('content_block_stop'), index: z.number().int().nonnegative() }),
  z.object({
    type: z.literal('message_delta'),
    delta: z.object({
      stop_reason: z.string().nullish(),
      stop_sequence: z.string().nullish(),
    }),
    usage: usageSchema.optional(),
  }),
  z.object({ type: z.literal('message_stop') }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('error'), error: errorDetailSchema }),
])

const apiErrorBodySchema = z.object({
  type: z.literal('error'),
  error: errorDetailSchema,
})

/**
 * Content block as sent on the wire.
 */
export type WireContentBlock = z.input<typeof contentBlockSchema>

/**
 * Message as sent on the wire.
 */
export interface WireMessage {
  role: Message['role']
  content: WireContentBlock[]
}

/**
 * Error detail from an API error body or a stream `error` event.
 */
export type ApiErrorDetail = z.infer<typeof errorDetailSchema>

/**
 * Formats a content block for the API.
 *
 * @param block - SDK content block
 * @returns Wire-formatted content block
 */
export function formatContentBlock(block: ContentBlock): WireContentBlock {
  switch (block.type) {
    case 'text':
      return {
        type: 'text',
        text: block.text,
        ...(block.cacheControl && { cache_control: block.cacheControl }),
      }

    case 'image':
      return {
        type: 'image',
        source: { type: block.source.type, media_type: block.source.mediaType, data: block.source.data },
      }

    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input }

    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.toolUseId,
        content: block.content,
        is_error: block.isError,
      }

    case 'thinking':
      return {
        type: 'thinking',
        thinking: block.thinking,
        ...(block.signature !== undefined && { signature: block.signature }),
      }
  }
}

/**
 * Formats a message for the API.
 *
 * @param message - SDK message
 * @returns Wire-formatted message
 */
export function formatMessage(message: Message): WireMessage {
  return { role: message.role, content: message.content.map(formatContentBlock) }
}

/**
 * Decodes a complete (non-streaming) response body.
 *
 * @param body - Parsed JSON body
 * @returns The response
 * @throws \{ResponseParseError\} When the body does not match the response shape
 */
export function parseMessagesResponse(body: unknown): MessagesResponse {
  return mapResponse(validate(messagesResponseSchema, body, 'response'))
}

/**
 * Decodes the data of one server-sent event.
 *
 * @param data - Raw `data:` payload
 * @returns The stream event
 * @throws \{ResponseParseError\} When the payload is not JSON or not a known event
 */
export function parseStreamEvent(data: string): StreamEvent {
  const event = validate(streamEventSchema, parseJson(data), 'stream event')

  switch (event.type) {
    case 'message_start':
      return { type: 'message_start', message: mapResponse(event.message) }
    case 'content_block_start':
      return { type: 'content_block_start', index: event.index, contentBlock: mapContentBlock(event.content_block) }
    case 'content_block_delta':
      return { type: 'content_block_delta', index: event.index, delta: mapDelta(event.delta) }
    case 'content_block_stop':
      return { type: 'content_block_stop', index: event.index }
    case 'message_delta': {
      const delta: { stopReason?: StopReason; stopSequence?: string } = {}
      const stopReason = mapStopReason(event.delta.stop_reason)
      if (stopReason !== undefined) delta.stopReason = stopReason
      if (event.delta.stop_sequence != null) delta.stopSequence = event.delta.stop_sequence
      return { type: 'message_delta', delta, usage: mapUsage(event.usage) }
    }
    case 'message_stop':
      return { type: 'message_stop' }
    case 'ping':
      return { type: 'ping' }
    case 'error':
      return { type: 'error', error: event.error }
  }
}

/**
 * Decodes an API error body.
 *
 * @param body - Parsed JSON body of a non-success response
 * @returns The error detail
 * @throws \{ResponseParseError\} When the body is not an API error
 */
export function parseApiErrorBody(body: unknown): ApiErrorDetail {
  return validate(apiErrorBodySchema, body, 'error response').error
}

/**
 * Decodes an API error body, if the text holds one.
 *
 * @param text - Raw body of a non-success response
 * @returns The error detail, or undefined when the body is not an API error
 */
export function tryParseApiErrorBody(text: string): ApiErrorDetail | undefined {
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    return undefined
  }
  const result = apiErrorBodySchema.safeParse(body)
  return result.success ? result.data.error : undefined
}

/**
 * Parses a JSON string, reporting failures as {@link ResponseParseError}.
 *
 * @param text - JSON text
 * @returns The parsed value
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ResponseParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    })
  }
}

function validate<T extends z.ZodType>(schema: T, value: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new ResponseParseError(`Unexpected ${what} shape:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }
  return result.data
}

function mapResponse(message: z.infer<typeof messagesResponseSchema>): MessagesResponse {
  return new MessagesResponse({
    id: message.id,
    model: message.model,
    role: message.role,
    content: message.content.map(mapContentBlock),
    stopReason: mapStopReason(message.stop_reason),
    stopSequence: message.stop_sequence ?? undefined,
    usage: mapUsage(message.usage),
  })
}

function mapContentBlock(block: z.infer<typeof contentBlockSchema>): ContentBlock {
  switch (block.type) {
    case 'text':
      return new TextBlock({ text: block.text, cacheControl: block.cache_control ?? undefined })
    case 'image':
      return new ImageBlock({
        source: { type: block.source.type, mediaType: block.source.media_type, data: block.source.data },
      })
    case 'tool_use':
      return new ToolUseBlock({ id: block.id, name: block.name, input: block.input })
    case 'tool_result':
      return new ToolResultBlock({ toolUseId: block.tool_use_id, content: block.content, isError: block.is_error ?? false })
    case 'thinking':
      return new ThinkingBlock({ thinking: block.thinking, signature: block.signature || undefined })
  }
}

function mapDelta(delta: z.infer<typeof deltaSchema>): ContentBlockDelta {
  switch (delta.type) {
    case 'text_delta':
    case 'thinking_delta':
    case 'signature_delta':
      return delta
    case 'input_json_delta':
      return { type: 'input_json_delta', partialJson: delta.partial_json }
  }
}

function mapUsage(usage: z.infer<typeof usageSchema> | undefined): Usage {
  const mapped: Usage = {}
  if (usage?.input_tokens != null) mapped.inputTokens = usage.input_tokens
  if (usage?.output_tokens != null) mapped.outputTokens = usage.output_tokens
  if (usage?.cache_creation_input_tokens != null) mapped.cacheCreationInputTokens = usage.cache_creation_input_tokens
  if (usage?.cache_read_input_tokens != null) mapped.cacheReadInputTokens = usage.cache_read_input_tokens
  return mapped
}

function mapStopReason(raw: string | null | undefined): StopReason | undefined {
  if (raw == null) {
    return undefined
  }
  const known = STOP_REASONS.find((reason) => reason === raw)
  if (known === undefined) {
    console.warn(`Unknown stop reason: "${raw}". Leaving stop reason unset.`)
  }
  return known
}
