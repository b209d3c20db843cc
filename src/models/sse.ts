/**
 * Server-sent event parsing.
 *
 * Splits a streaming HTTP body into discrete SSE frames: frames are delimited
 * by a blank line and carry `event:` and `data:` fields.
 */

/**
 * One server-sent event frame.
 */
export interface ServerSentEvent {
  /**
   * Value of the `event:` field, when present.
   */
  event?: string

  /**
   * `data:` lines joined with newlines.
   */
  data: string
}

/**
 * Parses a byte stream as server-sent events.
 *
 * Yields each complete frame that has data. Returning early (for example by
 * breaking out of a `for await` loop) cancels the underlying stream, which
 * releases the connection. Aborting `signal` cancels the stream even while a
 * read is pending; the generator then ends without yielding further frames.
 *
 * @param body - Response body
 * @param signal - Cancels the body when aborted
 * @returns Async generator of frames
 */
export async function* parseSSEStream(
  body: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<ServerSentEvent, void, undefined> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let buffer = ''
  let finished = false

  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch((error: unknown) => {
      console.debug(`Event stream cancel failed: ${error instanceof Error ? error.message : String(error)}`)
    })
  }
  signal?.addEventListener('abort', onAbort, { once: true })
  if (signal?.aborted) {
    onAbort()
  }

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) {
        finished = true
        if (signal?.aborted) {
          return
        }
        break
      }

      buffer = (buffer + decoder.decode(value, { stream: true })).replace(/\r\n/g, '\n')

      const frames = buffer.split('\n\n')
      // The last element is either empty or an incomplete frame
      buffer = frames.pop() ?? ''

      for (const frame of frames) {
        const event = parseFrame(frame)
        if (event !== undefined) {
          yield event
        }
      }
    }

    const trailing = parseFrame((buffer + decoder.decode()).replace(/\r\n/g, '\n'))
    if (trailing !== undefined) {
      yield trailing
    }
  } catch (error) {
    // An errored stream cannot be cancelled
    finished = true
    throw error
  } finally {
    signal?.removeEventListener('abort', onAbort)
    if (!finished) {
      await reader.cancel()
    }
    reader.releaseLock()
  }
}

/**
 * Parses the lines of one frame.
 *
 * @param frame - Frame text without the trailing blank line
 * @returns The event, or undefined for frames without data (comments, empty frames)
 */
export function parseFrame(frame: string): ServerSentEvent | undefined {
  let event: string | undefined
  const dataLines: string[] = []

  for (const line of frame.split('\n')) {
    // Lines starting with ':' are comments
    if (line === '' || line.startsWith(':')) continue

    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    let value = colon === -1 ? '' : line.slice(colon + 1)
    if (value.startsWith(' ')) value = value.slice(1)

    if (field === 'event') {
      event = value
    } else if (field === 'data') {
      dataLines.push(value)
    }
  }

  if (dataLines.length === 0) {
    return undefined
  }

  const parsed: ServerSentEvent = { data: dataLines.join('\n') }
  if (event !== undefined) {
    parsed.event = event
  }
  return parsed
}
