/**
 * HTTP client for the Messages API.
 *
 * This module sends requests with `fetch`, either awaiting a complete JSON
 * response or opening a server-sent-event stream, and maps HTTP failures to
 * the client's error types.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */

import { resolveClientConfig, type ClientConfig, type ResolvedClientConfig } from '../config.js'
import { BadRequestError, RateLimitedError, StreamError, TransportError, classifyApiError, normalizeError } from '../errors.js'
import type { MessagesResponse } from '../types/response.js'
import { MessageStream } from './message-stream.js'
import type { MessagesRequest, WireMessagesRequest } from './request.js'
import { parseApiErrorBody, parseJson, parseMessagesResponse, tryParseApiErrorBody } from './wire.js'

/**
 * Path of the Messages endpoint, relative to the base URL.
 */
const MESSAGES_PATH = '/v1/messages'

/**
 * Options for creating a MessagesClient instance.
 */
export interface MessagesClientOptions extends ClientConfig {
  /**
   * Fetch implementation. Defaults to the global `fetch`.
   */
  fetch?: typeof globalThis.fetch

  /**
   * Environment used to resolve the API key when `apiKey` is not set.
   */
  env?: NodeJS.ProcessEnv
}

/**
 * Per-call options.
 */
export interface RequestOptions {
  /**
   * Aborts the call. Timeouts are left to the caller.
   */
  signal?: AbortSignal
}

/**
 * Client for the Messages API.
 *
 * @example
 * ```typescript
 * const client = new MessagesClient({ apiKey: 'my-key' })
 *
 * const request = new MessagesRequest()
 * request.addUser('Hello!')
 *
 * const response = await client.messages(request)
 * console.log(response.formatContent())
 * ```
 */
export class MessagesClient {
  private _config: ResolvedClientConfig
  private readonly _fetch: typeof globalThis.fetch

  /**
   * Creates a new MessagesClient instance.
   *
   * @param options - Optional configuration; the API key falls back to `ANTHROPIC_API_KEY`
   * @throws \{ConfigError\} When no API key is available or a setting is invalid
   *
   * @example
   * ```typescript
   * // Key from the environment
   * const client = new MessagesClient()
   *
   * // Explicit key and defaults for requests
   * const client = new MessagesClient({
   *   apiKey: 'my-key',
   *   model: 'claude-3-7-sonnet-20250219',
   *   maxTokens: 2048,
   * })
   * ```
   */
  constructor(options?: MessagesClientOptions) {
    const { fetch: fetchImpl, env, ...config } = options ?? {}
    this._config = resolveClientConfig(config, env)
    this._fetch = fetchImpl ?? globalThis.fetch
  }

  /**
   * Updates the client configuration.
   * Merges the provided configuration with existing settings.
   *
   * @param config - Settings to update
   * @throws \{ConfigError\} When the merged configuration is invalid
   */
  updateConfig(config: ClientConfig): void {
    this._config = resolveClientConfig({ ...this._config, ...config })
  }

  /**
   * Retrieves the current client configuration.
   *
   * @returns The current configuration object
   */
  getConfig(): ResolvedClientConfig {
    return this._config
  }

  /**
   * Sends a request and waits for the complete response.
   *
   * @param request - A request with `stream` unset
   * @param options - Optional per-call options
   * @returns The generated response
   *
   * @throws \{BadRequestError\} When the request asks for streaming, or the API rejects it
   * @throws \{TransportError\} When the HTTP request fails or its body cannot be read
   * @throws \{ResponseParseError\} When a body cannot be decoded
   */
  async messages(request: MessagesRequest, options?: RequestOptions): Promise<MessagesResponse> {
    if (request.stream) {
      throw new BadRequestError('Request has stream set; use messagesStream() to send it')
    }

    let response: Response
    let text: string
    try {
      response = await this._post(this._formatRequest(request), options?.signal)
      text = await response.text()
    } catch (error) {
      const cause = normalizeError(error)
      throw new TransportError(`HTTP request failed: ${cause.message}`, { cause })
    }

    if (!response.ok) {
      const detail = parseApiErrorBody(parseJson(text))
      throw classifyApiError(detail.type, detail.message, response.status)
    }

    return parseMessagesResponse(parseJson(text))
  }

  /**
   * Opens a streamed response.
   *
   * The handle is returned immediately; the HTTP request is made on the first
   * pull. See {@link MessageStream} for how events and failures surface.
   *
   * @param request - A request with `stream` set
   * @param options - Optional per-call options
   * @returns Live stream handle
   *
   * @throws \{BadRequestError\} When the request does not ask for streaming; nothing is sent
   *
   * @example
   * ```typescript
   * const request = new MessagesRequest().withThinking(1024).withMaxTokens(2048).withStream(true)
   * request.addUser('What is 453 + 897?')
   *
   * const stream = client.messagesStream(request)
   * for await (const event of stream) {
   *   if (event.type === 'content_block_delta' && event.delta.type === 'thinking_delta') {
   *     process.stdout.write(event.delta.thinking)
   *   }
   * }
   * console.log(stream.response.formatContent())
   * ```
   */
  messagesStream(request: MessagesRequest, options?: RequestOptions): MessageStream {
    if (!request.stream) {
      throw new BadRequestError('Request does not have stream set; call withStream(true) before messagesStream()')
    }

    const body = this._formatRequest(request)

    return new MessageStream(async (signal) => {
      const combined = options?.signal ? AbortSignal.any([signal, options.signal]) : signal

      const response = await this._post(body, combined)

      if (!response.ok) {
        const text = await response.text()
        const detail = tryParseApiErrorBody(text)
        if (detail !== undefined) {
          throw classifyApiError(detail.type, detail.message, response.status)
        }
        if (response.status === 429) {
          throw new RateLimitedError(`Stream request was rate limited: ${text}`, { status: response.status })
        }
        throw new StreamError(`Stream request failed with status ${response.status}: ${text}`, {
          status: response.status,
        })
      }

      if (response.body === null) {
        throw new StreamError('Stream response has no body', { status: response.status })
      }

      return response.body
    })
  }

  /**
   * Formats a request body, filling an empty model and a zero max-token
   * budget from the client configuration.
   *
   * @param request - The request
   * @returns Wire-formatted request body
   */
  private _formatRequest(request: MessagesRequest): WireMessagesRequest {
    const body = request.toJSON()
    return {
      ...body,
      model: body.model || this._config.model,
      max_tokens: body.max_tokens || this._config.maxTokens,
    }
  }

  private _post(body: WireMessagesRequest, signal: AbortSignal | undefined): Promise<Response> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'x-api-key': this._config.apiKey,
      'anthropic-version': this._config.apiVersion,
    }
    if (body.stream) {
      headers.accept = 'text/event-stream'
    }
    if (this._config.betas.length > 0) {
      headers['anthropic-beta'] = this._config.betas.join(',')
    }

    const init: RequestInit = { method: 'POST', headers, body: JSON.stringify(body) }
    if (signal !== undefined) {
      init.signal = signal
    }
    return this._fetch(`${this._config.baseUrl}${MESSAGES_PATH}`, init)
  }
}
