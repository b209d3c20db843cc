/**
 * Live handle over a streaming Messages API call.
 */

import { ClientError, StreamError, classifyApiError, normalizeError } from '../errors.js'
import { MessagesResponse } from '../types/response.js'
import { parseSSEStream, type ServerSentEvent } from './sse.js'
import { mergeStreamEvent } from './stream-merge.js'
import type { StreamEvent } from './streaming.js'
import { parseStreamEvent } from './wire.js'

/**
 * Opens the underlying event stream.
 *
 * Implementations issue the HTTP request and resolve with the response body,
 * or reject with a {@link ClientError} describing why the subscription could
 * not be established. The signal is aborted when the handle closes.
 */
export type StreamOpener = (signal: AbortSignal) => Promise<ReadableStream<Uint8Array>>

/**
 * Pull-driven iterator over the events of one streamed response.
 *
 * Every pulled event is merged into {@link MessageStream.response} before it
 * is returned, so the response always reflects the events seen so far. The
 * handle is Open until `message_stop` arrives, the transport ends or fails, or
 * the caller closes it; the connection is released exactly once on that
 * transition. Breaking out of a `for await` loop closes the handle.
 *
 * Failures surface from `next()`:
 * - a malformed event rejects with `ResponseParseError`, the handle stays open
 * - a delta aimed at a tool use block rejects with `UnsupportedOperationError`, the handle stays open
 * - an `error` event rejects with the classified API error, the handle stays open
 * - a failed request rejects with the classified API error when its body decodes, otherwise with
 *   `StreamError` (`RateLimitedError` for 429), and closes the handle
 * - a transport failure rejects with `StreamError` and closes the handle
 *
 * @example
 * ```typescript
 * const stream = client.messagesStream(request.withStream(true))
 * for await (const event of stream) {
 *   if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
 *     process.stdout.write(event.delta.text)
 *   }
 * }
 * console.log(stream.response.stopReason)
 * ```
 */
export class MessageStream implements AsyncIterableIterator<StreamEvent> {
  /**
   * Response accumulated from the events pulled so far.
   */
  readonly response: MessagesResponse = new MessagesResponse()

  /**
   * Events that could not be applied and were skipped.
   */
  readonly anomalies: string[] = []

  private readonly _open: StreamOpener
  private readonly _abortController = new AbortController()
  private _frames: AsyncGenerator<ServerSentEvent, void, undefined> | undefined
  private _closed = false

  constructor(open: StreamOpener) {
    this._open = open
  }

  /**
   * Whether the handle has stopped producing events.
   */
  get closed(): boolean {
    return this._closed
  }

  /**
   * Text of all text blocks received so far.
   */
  currentText(): string {
    return this.response.text()
  }

  /**
   * Pulls the next event, merging it into the response.
   */
  async next(): Promise<IteratorResult<StreamEvent, undefined>> {
    if (this._closed) {
      return { done: true, value: undefined }
    }

    const frame = await this._nextFrame()
    if (this._closed) {
      return { done: true, value: undefined }
    }
    if (frame === undefined) {
      await this.close()
      return { done: true, value: undefined }
    }

    const event = parseStreamEvent(frame.data)
    const outcome = mergeStreamEvent(this.response, event)

    if (outcome.type === 'anomaly') {
      console.warn(`Skipping stream event: ${outcome.message}`)
      this.anomalies.push(outcome.message)
    }

    if (event.type === 'error') {
      throw classifyApiError(event.error.type, event.error.message)
    }

    if (event.type === 'message_stop') {
      await this.close()
    }

    return { done: false, value: event }
  }

  /**
   * Closes the handle early. Called by `for await` when the loop exits.
   */
  async return(): Promise<IteratorResult<StreamEvent, undefined>> {
    await this.close()
    return { done: true, value: undefined }
  }

  [Symbol.asyncIterator](): MessageStream {
    return this
  }

  /**
   * Releases the connection. Safe to call any number of times.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return
    }
    this._closed = true

    // A pending read holds the generator until the abort cancels its reader
    this._abortController.abort()

    const frames = this._frames
    this._frames = undefined
    await frames?.return(undefined)
  }

  /**
   * Drains the remaining events and resolves with the complete response.
   */
  async finalResponse(): Promise<MessagesResponse> {
    for await (const _event of this) {
      // Events are merged as they are pulled
    }
    return this.response
  }

  private async _nextFrame(): Promise<ServerSentEvent | undefined> {
    try {
      if (this._frames === undefined) {
        const body = await this._open(this._abortController.signal)
        if (this._closed) {
          await body.cancel()
          return undefined
        }
        this._frames = parseSSEStream(body, this._abortController.signal)
      }
      const result = await this._frames.next()
      return result.done ? undefined : result.value
    } catch (error) {
      if (this._closed) {
        return undefined
      }
      await this.close()
      if (error instanceof ClientError) {
        throw error
      }
      const cause = normalizeError(error)
      throw new StreamError(`Event stream failed: ${cause.message}`, { cause })
    }
  }
}
