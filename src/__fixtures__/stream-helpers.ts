/**
 * Test fixtures and helpers for streaming tests.
 * This module builds wire-format stream events, SSE byte streams and fake
 * fetch implementations.
 */

import { vi, type Mock } from 'vitest'

/**
 * A wire-format stream event, as the API sends it in the `data:` field.
 */
export type WireEvent = { type: string } & Record<string, unknown>

/**
 * Formats one wire event as an SSE frame.
 *
 * @param event - Wire event
 * @returns Frame text including the trailing blank line
 */
export function sseFrame(event: WireEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`
}

/**
 * Wire events of a complete streamed text response.
 *
 * @param parts - Text deltas in order
 * @returns The events from `message_start` through `message_stop`
 */
export function textResponseEvents(parts: string[]): WireEvent[] {
  return [
    {
      type: 'message_start',
      message: {
        id: 'msg_test',
        type: 'message',
        role: 'assistant',
        model: 'test-model',
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 12, output_tokens: 1 },
      },
    },
    { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
    { type: 'ping' },
    ...parts.map((text) => ({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } })),
    { type: 'content_block_stop', index: 0 },
    { type: 'message_delta', delta: { stop_reason: 'end_turn', stop_sequence: null }, usage: { output_tokens: 5 } },
    { type: 'message_stop' },
  ]
}

/**
 * A byte stream whose cancellation can be observed.
 */
export interface TestByteStream {
  body: ReadableStream<Uint8Array>

  /**
   * Called when the consumer cancels the stream.
   */
  cancel: Mock<(reason: unknown) => void>
}

/**
 * Creates a byte stream that delivers the given chunks one per pull.
 *
 * @param chunks - Text chunks in order
 * @param options - Set `error` to fail the stream after the last chunk instead of closing it
 * @returns The stream and its cancel spy
 */
export function createByteStream(chunks: string[], options?: { error?: Error }): TestByteStream {
  const encoder = new TextEncoder()
  const cancel = vi.fn<(reason: unknown) => void>()
  let position = 0

  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[position++]
      if (chunk !== undefined) {
        controller.enqueue(encoder.encode(chunk))
      } else if (options?.error !== undefined) {
        controller.error(options.error)
      } else {
        controller.close()
      }
    },
    cancel,
  })

  return { body, cancel }
}

/**
 * Creates a byte stream carrying the given wire events, one frame per chunk.
 *
 * @param events - Wire events in order
 * @returns The stream and its cancel spy
 */
export function createEventStream(events: WireEvent[]): TestByteStream {
  return createByteStream(events.map(sseFrame))
}

/**
 * Creates a fetch fake that answers every call with the given response.
 *
 * @param respond - Builds a fresh response for each call
 * @returns The fetch mock
 */
export function createFakeFetch(respond: () => Response): Mock<typeof globalThis.fetch> {
  return vi.fn<typeof globalThis.fetch>(async () => respond())
}

/**
 * Creates a JSON response.
 *
 * @param body - Value to serialize
 * @param status - HTTP status
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

/**
 * Wire body of a complete text response.
 *
 * @param text - Text of the single text block
 */
export function textResponseBody(text: string): WireEvent {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    model: 'test-model',
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: { input_tokens: 10, output_tokens: 3 },
  }
}
