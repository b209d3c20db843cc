import { describe, it, expect } from 'vitest'
import {
  createByteStream,
  createEventStream,
  createFakeFetch,
  jsonResponse,
  textResponseBody,
  textResponseEvents,
} from '../../__fixtures__/stream-helpers.js'
import { DEFAULT_MODEL } from '../../config.js'
import {
  BadRequestError,
  ConfigError,
  OverloadedError,
  RateLimitedError,
  ResponseParseError,
  StreamError,
  TransportError,
} from '../../errors.js'
import { MessagesClient } from '../client.js'
import { MessagesRequest } from '../request.js'

const MESSAGES_URL = 'https://api.anthropic.com/v1/messages'

function userRequest(text: string): MessagesRequest {
  const request = new MessagesRequest()
  request.addUser(text)
  return request
}

function sentBody(fetch: ReturnType<typeof createFakeFetch>): unknown {
  const init = fetch.mock.calls[0]?.[1]
  return JSON.parse(String(init?.body))
}

describe('MessagesClient', () => {
  describe('constructor', () => {
    it('reads the API key from the environment', () => {
      const client = new MessagesClient({ env: { ANTHROPIC_API_KEY: 'test-secret' } })

      expect(client.getConfig()).toEqual({
        apiKey: 'test-secret',
        baseUrl: 'https://api.anthropic.com',
        model: DEFAULT_MODEL,
        maxTokens: 1024,
        apiVersion: '2023-06-01',
        betas: [],
      })
    })

    it('throws ConfigError without an API key', () => {
      expect(() => new MessagesClient({ env: {} })).toThrow(ConfigError)
    })
  })

  describe('updateConfig', () => {
    it('merges new settings into the current configuration', () => {
      const client = new MessagesClient({ apiKey: 'test-secret', env: {} })

      client.updateConfig({ maxTokens: 4096, betas: ['output-128k-2025-02-19'] })

      expect(client.getConfig()).toMatchObject({
        apiKey: 'test-secret',
        maxTokens: 4096,
        betas: ['output-128k-2025-02-19'],
      })
    })
  })

  describe('messages', () => {
    it('posts the request and decodes the response', async () => {
      const fetch = createFakeFetch(() => jsonResponse(textResponseBody('Hi there')))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const response = await client.messages(userRequest('hello'))

      expect(response.formatContent()).toBe('Hi there')
      expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 3 })
      expect(fetch).toHaveBeenCalledWith(
        MESSAGES_URL,
        expect.objectContaining({
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            'x-api-key': 'test-secret',
            'anthropic-version': '2023-06-01',
          },
        })
      )
      expect(sentBody(fetch)).toEqual({
        model: DEFAULT_MODEL,
        max_tokens: 1024,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'hello' }] }],
        stream: false,
      })
    })

    it('fills an empty model and max-token budget from the client', async () => {
      const fetch = createFakeFetch(() => jsonResponse(textResponseBody('ok')))
      const client = new MessagesClient({ apiKey: 'test-secret', model: 'client-model', maxTokens: 512, fetch })

      await client.messages(userRequest('hello').withModel('').withMaxTokens(0))

      expect(sentBody(fetch)).toMatchObject({ model: 'client-model', max_tokens: 512 })
    })

    it('sends beta features and a custom base URL', async () => {
      const fetch = createFakeFetch(() => jsonResponse(textResponseBody('ok')))
      const client = new MessagesClient({
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:8080/',
        betas: ['token-efficient-tools-2025-02-19', 'output-128k-2025-02-19'],
        fetch,
      })

      await client.messages(userRequest('hello'))

      expect(fetch).toHaveBeenCalledWith(
        'http://localhost:8080/v1/messages',
        expect.objectContaining({
          headers: expect.objectContaining({
            'anthropic-beta': 'token-efficient-tools-2025-02-19,output-128k-2025-02-19',
          }),
        })
      )
    })

    it('rejects a streaming request without calling the API', async () => {
      const fetch = createFakeFetch(() => jsonResponse(textResponseBody('unused')))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      await expect(client.messages(userRequest('hello').withStream(true))).rejects.toThrow(BadRequestError)
      expect(fetch).not.toHaveBeenCalled()
    })

    it('classifies API error bodies', async () => {
      const fetch = createFakeFetch(() =>
        jsonResponse({ type: 'error', error: { type: 'invalid_request_error', message: 'messages: required' } }, 400)
      )
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const error = await client.messages(new MessagesRequest()).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(BadRequestError)
      expect(error).toHaveProperty('message', 'messages: required')
      expect(error).toHaveProperty('status', 400)
    })

    it('reports overload as a retryable error', async () => {
      const fetch = createFakeFetch(() =>
        jsonResponse({ type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } }, 529)
      )
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const error = await client.messages(userRequest('hello')).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(OverloadedError)
      expect(error instanceof OverloadedError && error.isRetryable).toBe(true)
    })

    it('reports an error body that cannot be decoded', async () => {
      const fetch = createFakeFetch(() => new Response('<html>Bad Gateway</html>', { status: 502 }))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      await expect(client.messages(userRequest('hello'))).rejects.toThrow(ResponseParseError)
    })

    it('wraps fetch failures in TransportError', async () => {
      const fetch = createFakeFetch(() => {
        throw new TypeError('fetch failed')
      })
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      await expect(client.messages(userRequest('hello'))).rejects.toThrow(
        new TransportError('HTTP request failed: fetch failed')
      )
    })

    it('wraps a body that fails mid-read in TransportError', async () => {
      const { body } = createByteStream(['{"id":'], { error: new TypeError('terminated') })
      const fetch = createFakeFetch(() => new Response(body))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const error = await client.messages(userRequest('hello')).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(TransportError)
      expect(error).toHaveProperty('message', 'HTTP request failed: terminated')
    })
  })

  describe('messagesStream', () => {
    it('streams events into the response', async () => {
      const fetch = createFakeFetch(() => new Response(createEventStream(textResponseEvents(['Hi', ' there'])).body))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))
      const response = await stream.finalResponse()

      expect(response.formatContent()).toBe('Hi there')
      expect(response.stopReason).toBe('end_turn')
      expect(fetch).toHaveBeenCalledWith(
        MESSAGES_URL,
        expect.objectContaining({ headers: expect.objectContaining({ accept: 'text/event-stream' }) })
      )
      expect(sentBody(fetch)).toMatchObject({ stream: true })
    })

    it('does not call the API before the first pull', () => {
      const fetch = createFakeFetch(() => new Response(createEventStream([]).body))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      client.messagesStream(userRequest('hello').withStream(true))

      expect(fetch).not.toHaveBeenCalled()
    })

    it('rejects a request without the stream flag without calling the API', () => {
      const fetch = createFakeFetch(() => new Response(createEventStream([]).body))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      expect(() => client.messagesStream(userRequest('hello'))).toThrow(BadRequestError)
      expect(fetch).not.toHaveBeenCalled()
    })

    it('aborts the request when the stream is closed', async () => {
      const fetch = createFakeFetch(() => new Response(createEventStream(textResponseEvents(['Hi'])).body))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))
      await stream.next()
      await stream.close()

      expect(fetch.mock.calls[0]?.[1]?.signal?.aborted).toBe(true)
    })

    it('reports 429 as RateLimitedError', async () => {
      const fetch = createFakeFetch(() => new Response('slow down', { status: 429 }))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))

      await expect(stream.next()).rejects.toThrow(RateLimitedError)
      expect(stream.closed).toBe(true)
    })

    it('classifies a decodable error body', async () => {
      const fetch = createFakeFetch(() =>
        jsonResponse({ type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } }, 529)
      )
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))
      const error = await stream.next().catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(OverloadedError)
      expect(error).toHaveProperty('status', 529)
      expect(stream.closed).toBe(true)
    })

    it('reports other failures as StreamError', async () => {
      const fetch = createFakeFetch(() => new Response('unavailable', { status: 503 }))
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))

      await expect(stream.next()).rejects.toThrow(
        new StreamError('Stream request failed with status 503: unavailable')
      )
    })

    it('reports fetch failures as StreamError', async () => {
      const fetch = createFakeFetch(() => {
        throw new TypeError('fetch failed')
      })
      const client = new MessagesClient({ apiKey: 'test-secret', fetch })

      const stream = client.messagesStream(userRequest('hello').withStream(true))

      await expect(stream.next()).rejects.toThrow(StreamError)
    })
  })
})
