import { describe, it, expect } from 'vitest'
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from '../../config.js'
import { TEXT_EDITOR_4 } from '../../tools/types.js'
import { ImageBlock, Message, TextBlock, ToolResultBlock, ToolUseBlock } from '../../types/messages.js'
import { MessagesRequest } from '../request.js'

describe('MessagesRequest', () => {
  describe('constructor', () => {
    it('applies defaults', () => {
      const request = new MessagesRequest()

      expect(request.model).toBe(DEFAULT_MODEL)
      expect(request.maxTokens).toBe(DEFAULT_MAX_TOKENS)
      expect(request.messages).toEqual([])
      expect(request.stream).toBe(false)
      expect(request.toolChoice).toEqual({ type: 'auto' })
    })

    it('copies the messages it is given', () => {
      const messages = [new Message({ role: 'user', content: [new TextBlock('hello')] })]

      const request = new MessagesRequest({ messages })
      request.addUser('again')

      expect(messages[0]?.content).toHaveLength(1)
      expect(request.messages[0]?.content).toHaveLength(2)
    })
  })

  describe('addUser and addAssistant', () => {
    it('coalesces consecutive turns of the same role', () => {
      const request = new MessagesRequest()

      request.addUser('first')
      request.addUser('second')
      request.addAssistant('reply')
      request.addUser('third')

      expect(request.messages.map((message) => message.role)).toEqual(['user', 'assistant', 'user'])
      expect(request.messages[0]?.content).toEqual([new TextBlock('first'), new TextBlock('second')])
      expect(request.messages[2]?.content).toEqual([new TextBlock('third')])
    })

    it('starts the history with an assistant turn when asked to', () => {
      const request = new MessagesRequest()

      request.addAssistant('prefill')

      expect(request.messages).toHaveLength(1)
      expect(request.messages[0]?.role).toBe('assistant')
    })

    it('accepts content blocks', () => {
      const toolUse = new ToolUseBlock({ id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } })
      const request = new MessagesRequest()

      request.addUser('Weather in Paris?')
      request.addAssistant(toolUse)
      request.addUser(ToolResultBlock.forToolUse(toolUse, '18C and sunny'))

      expect(request.messages[2]?.content).toEqual([
        new ToolResultBlock({ toolUseId: 'toolu_1', content: '18C and sunny', isError: false }),
      ])
    })
  })

  describe('withX methods', () => {
    it('return a new request and leave the original unchanged', () => {
      const original = new MessagesRequest()
      original.addUser('hello')

      const updated = original.withModel('other-model').withMaxTokens(2048).withTemperature(0.5)

      expect(updated).not.toBe(original)
      expect(original.model).toBe(DEFAULT_MODEL)
      expect(original.temperature).toBeUndefined()
      expect(updated.model).toBe('other-model')
      expect(updated.maxTokens).toBe(2048)
      expect(updated.temperature).toBe(0.5)
      expect(updated.messages).toEqual(original.messages)
    })

    it('do not share the message history', () => {
      const original = new MessagesRequest()
      original.addUser('hello')

      const updated = original.withStream(true)
      updated.addUser('more')
      updated.addAssistant('reply')

      expect(original.messages).toHaveLength(1)
      expect(original.messages[0]?.content).toHaveLength(1)
      expect(updated.messages).toHaveLength(2)
    })

    it('append tools', () => {
      const request = new MessagesRequest()
        .withTool({ type: 'custom', name: 'a', description: 'A', inputSchema: { type: 'object' } })
        .withTools([{ type: 'custom', name: 'b', description: 'B', inputSchema: { type: 'object' } }])
        .withTextEditor(TEXT_EDITOR_4)

      expect(request.tools.map((tool) => tool.type)).toEqual(['custom', 'custom', 'text_editor'])
    })
  })

  describe('toJSON', () => {
    it('omits empty and default fields', () => {
      const request = new MessagesRequest()
      request.addUser('hello')

      expect(request.toJSON()).toEqual({
        model: DEFAULT_MODEL,
        max_tokens: DEFAULT_MAX_TOKENS,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'hello' }] }],
        stream: false,
      })
    })

    it('formats every configured field', () => {
      const request = new MessagesRequest()
        .withModel('test-model')
        .withMaxTokens(2048)
        .withSystem('Be brief.')
        .withTemperature(0.2)
        .withTopK(40)
        .withTopP(0.9)
        .withMetadata('user-1')
        .withStream(true)
        .withTool({
          type: 'custom',
          name: 'get_weather',
          description: 'Get the weather',
          inputSchema: { type: 'object', properties: { city: { type: 'string' } } },
        })
        .withTextEditor(TEXT_EDITOR_4)
        .withToolChoice({ type: 'tool', name: 'get_weather' })
        .withStopSequences(['END'])
        .withThinking(1024)
      request.addUser('hello')

      expect(request.toJSON()).toEqual({
        model: 'test-model',
        max_tokens: 2048,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'hello' }] }],
        system: [{ type: 'text', text: 'Be brief.' }],
        temperature: 0.2,
        top_k: 40,
        top_p: 0.9,
        metadata: { user_id: 'user-1' },
        stream: true,
        tools: [
          {
            name: 'get_weather',
            description: 'Get the weather',
            input_schema: { type: 'object', properties: { city: { type: 'string' } } },
          },
          { type: 'text_editor_20250429', name: 'str_replace_based_edit_tool' },
        ],
        tool_choice: { type: 'tool', name: 'get_weather' },
        stop_sequences: ['END'],
        thinking: { type: 'enabled', budget_tokens: 1024 },
      })
    })

    it('formats blocks with snake_case fields', () => {
      const request = new MessagesRequest()
      request.addSystem(new TextBlock('cached prefix').withCacheControl())
      request.addUser(new ImageBlock({ source: { type: 'base64', mediaType: 'image/png', data: 'aGk=' } }))
      request.addUser(new ToolResultBlock({ toolUseId: 'toolu_1', content: 'failed', isError: true }))

      const body = request.toJSON()

      expect(body.system).toEqual([{ type: 'text', text: 'cached prefix', cache_control: { type: 'ephemeral' } }])
      expect(body.messages[0]?.content).toEqual([
        { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'aGk=' } },
        { type: 'tool_result', tool_use_id: 'toolu_1', content: 'failed', is_error: true },
      ])
    })

    it('appends to the system prompt with addSystem', () => {
      const request = new MessagesRequest().withSystem('one')
      request.addSystem('two')

      expect(request.toJSON().system).toEqual([
        { type: 'text', text: 'one' },
        { type: 'text', text: 'two' },
      ])
    })
  })
})
