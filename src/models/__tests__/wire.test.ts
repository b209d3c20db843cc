import { describe, it, expect, vi } from 'vitest'
import { ResponseParseError } from '../../errors.js'
import { TextBlock, ThinkingBlock, ToolUseBlock } from '../../types/messages.js'
import { parseApiErrorBody, parseJson, parseMessagesResponse, parseStreamEvent } from '../wire.js'

describe('parseMessagesResponse', () => {
  it('maps a complete response', () => {
    const response = parseMessagesResponse({
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      model: 'test-model',
      content: [
        { type: 'thinking', thinking: 'Let me check.', signature: 'test-signature' },
        { type: 'text', text: 'Checking the weather.' },
        { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } },
      ],
      stop_reason: 'tool_use',
      stop_sequence: null,
      usage: { input_tokens: 20, output_tokens: 8, cache_read_input_tokens: null },
    })

    expect(response.id).toBe('msg_1')
    expect(response.content).toEqual([
      new ThinkingBlock({ thinking: 'Let me check.', signature: 'test-signature' }),
      new TextBlock('Checking the weather.'),
      new ToolUseBlock({ id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } }),
    ])
    expect(response.stopReason).toBe('tool_use')
    expect(response.stopSequence).toBeUndefined()
    expect(response.usage).toEqual({ inputTokens: 20, outputTokens: 8 })
    expect(response.toolUses()).toHaveLength(1)
  })

  it('leaves an unknown stop reason unset', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const response = parseMessagesResponse({
      id: 'msg_1',
      role: 'assistant',
      model: 'test-model',
      content: [],
      stop_reason: 'pause_turn',
    })

    expect(response.stopReason).toBeUndefined()
    expect(warn).toHaveBeenCalledWith('Unknown stop reason: "pause_turn". Leaving stop reason unset.')
  })

  it('rejects a body missing required fields', () => {
    expect(() => parseMessagesResponse({ id: 'msg_1', content: [] })).toThrow(ResponseParseError)
  })

  it('rejects an unknown content block type', () => {
    expect(() =>
      parseMessagesResponse({
        id: 'msg_1',
        role: 'assistant',
        model: 'test-model',
        content: [{ type: 'hologram' }],
      })
    ).toThrow(/^Unexpected response shape:/)
  })
})

describe('parseStreamEvent', () => {
  it('maps a content block delta', () => {
    expect(parseStreamEvent('{"type":"content_block_delta","index":1,"delta":{"type":"text_delta","text":"Hi"}}')).toEqual(
      { type: 'content_block_delta', index: 1, delta: { type: 'text_delta', text: 'Hi' } }
    )
  })

  it('maps input_json_delta to camelCase', () => {
    expect(
      parseStreamEvent(
        '{"type":"content_block_delta","index":0,"delta":{"type":"input_json_delta","partial_json":"{\\"a\\":"}}'
      )
    ).toEqual({ type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partialJson: '{"a":' } })
  })

  it('maps a message delta', () => {
    expect(
      parseStreamEvent(
        JSON.stringify({
          type: 'message_delta',
          delta: { stop_reason: 'max_tokens', stop_sequence: null },
          usage: { output_tokens: 15 },
        })
      )
    ).toEqual({ type: 'message_delta', delta: { stopReason: 'max_tokens' }, usage: { outputTokens: 15 } })
  })

  it('maps an error event', () => {
    expect(parseStreamEvent('{"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}')).toEqual({
      type: 'error',
      error: { type: 'overloaded_error', message: 'Overloaded' },
    })
  })

  it('maps a content block start', () => {
    expect(parseStreamEvent('{"type":"content_block_start","index":0,"content_block":{"type":"text","text":""}}')).toEqual(
      { type: 'content_block_start', index: 0, contentBlock: new TextBlock('') }
    )
  })

  it('rejects data that is not JSON', () => {
    expect(() => parseStreamEvent('not json')).toThrow(ResponseParseError)
  })

  it('rejects an unknown event type', () => {
    expect(() => parseStreamEvent('{"type":"message_pause"}')).toThrow(/^Unexpected stream event shape:/)
  })
})

describe('parseApiErrorBody', () => {
  it('returns the error detail', () => {
    expect(
      parseApiErrorBody({ type: 'error', error: { type: 'invalid_request_error', message: 'max_tokens: required' } })
    ).toEqual({ type: 'invalid_request_error', message: 'max_tokens: required' })
  })

  it('rejects a body that is not an error', () => {
    expect(() => parseApiErrorBody({ message: 'nope' })).toThrow(ResponseParseError)
  })
})

describe('parseJson', () => {
  it('wraps syntax errors', () => {
    expect(() => parseJson('{')).toThrow(/^Invalid JSON: /)
  })
})
