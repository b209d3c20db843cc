/**
 * Outbound Messages API request.
 */

import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from '../config.js'
import { formatTool, type TextEditorVersion, type Tool, type ToolChoice, type WireTool } from '../tools/types.js'
import { Message, TextBlock, type ContentBlock, type Role } from '../types/messages.js'
import { formatContentBlock, formatMessage, type WireContentBlock, type WireMessage } from './wire.js'

/**
 * Data for a messages request.
 */
export interface MessagesRequestData {
  model: string
  maxTokens: number
  messages: Message[]
  /**
   * System prompt blocks. Empty means no system prompt.
   */
  system: TextBlock[]
  temperature?: number | undefined
  topK?: number | undefined
  topP?: number | undefined
  /**
   * Opaque identifier of the end user, sent as `metadata.user_id`.
   */
  userId?: string | undefined
  stream: boolean
  tools: Tool[]
  toolChoice: ToolChoice
  stopSequences: string[]
  /**
   * Token budget for extended thinking. Thinking is disabled when absent.
   */
  thinkingBudget?: number | undefined
}

/**
 * Request body as sent on the wire.
 */
export interface WireMessagesRequest {
  model: string
  max_tokens: number
  messages: WireMessage[]
  system?: WireContentBlock[]
  temperature?: number
  top_k?: number
  top_p?: number
  metadata?: { user_id: string }
  stream: boolean
  tools?: WireTool[]
  tool_choice?: ToolChoice
  stop_sequences?: string[]
  thinking?: { type: 'enabled'; budget_tokens: number }
}

/**
 * A request for one generated turn.
 *
 * `withX` methods return a new request and leave the receiver unchanged.
 * `addUser`, `addAssistant` and `addSystem` append in place; consecutive
 * additions for the same role go into the same message, so the history keeps
 * alternating between user and assistant turns.
 *
 * @example
 * ```typescript
 * const request = new MessagesRequest()
 *   .withMaxTokens(1000)
 *   .withSystem('You are a helpful assistant.')
 *
 * request.addUser('What is 453 + 897?')
 * const response = await client.messages(request)
 * ```
 */
export class MessagesRequest implements MessagesRequestData {
  readonly model: string
  readonly maxTokens: number
  readonly messages: Message[]
  readonly system: TextBlock[]
  readonly temperature?: number | undefined
  readonly topK?: number | undefined
  readonly topP?: number | undefined
  readonly userId?: string | undefined
  readonly stream: boolean
  readonly tools: Tool[]
  readonly toolChoice: ToolChoice
  readonly stopSequences: string[]
  readonly thinkingBudget?: number | undefined

  constructor(data?: Partial<MessagesRequestData>) {
    this.model = data?.model ?? DEFAULT_MODEL
    this.maxTokens = data?.maxTokens ?? DEFAULT_MAX_TOKENS
    this.messages = (data?.messages ?? []).map((message) => new Message({ role: message.role, content: [...message.content] }))
    this.system = [...(data?.system ?? [])]
    this.temperature = data?.temperature
    this.topK = data?.topK
    this.topP = data?.topP
    this.userId = data?.userId
    this.stream = data?.stream ?? false
    this.tools = [...(data?.tools ?? [])]
    this.toolChoice = data?.toolChoice ?? { type: 'auto' }
    this.stopSequences = [...(data?.stopSequences ?? [])]
    this.thinkingBudget = data?.thinkingBudget
  }

  withModel(model: string): MessagesRequest {
    return this._with({ model })
  }

  withMaxTokens(maxTokens: number): MessagesRequest {
    return this._with({ maxTokens })
  }

  /**
   * Replaces the system prompt.
   *
   * @param system - A plain string or a list of text blocks
   */
  withSystem(system: string | TextBlock[]): MessagesRequest {
    return this._with({ system: typeof system === 'string' ? [new TextBlock(system)] : system })
  }

  withTemperature(temperature: number): MessagesRequest {
    return this._with({ temperature })
  }

  withTopK(topK: number): MessagesRequest {
    return this._with({ topK })
  }

  withTopP(topP: number): MessagesRequest {
    return this._with({ topP })
  }

  /**
   * Sets the end-user identifier sent in `metadata.user_id`.
   */
  withMetadata(userId: string): MessagesRequest {
    return this._with({ userId })
  }

  /**
   * Marks the request for streaming. Which client method may send it depends
   * on this flag.
   */
  withStream(stream: boolean): MessagesRequest {
    return this._with({ stream })
  }

  withTool(tool: Tool): MessagesRequest {
    return this._with({ tools: [...this.tools, tool] })
  }

  withTools(tools: Tool[]): MessagesRequest {
    return this._with({ tools: [...this.tools, ...tools] })
  }

  /**
   * Declares the built-in text editor tool.
   *
   * @param version - `TEXT_EDITOR_37` or `TEXT_EDITOR_4`, matching the model generation
   */
  withTextEditor(version: TextEditorVersion): MessagesRequest {
    return this.withTool({ type: 'text_editor', version })
  }

  withToolChoice(toolChoice: ToolChoice): MessagesRequest {
    return this._with({ toolChoice })
  }

  withStopSequences(stopSequences: string[]): MessagesRequest {
    return this._with({ stopSequences })
  }

  /**
   * Enables extended thinking.
   *
   * @param budgetTokens - Tokens the model may spend thinking; must be below the max-token budget
   */
  withThinking(budgetTokens: number): MessagesRequest {
    return this._with({ thinkingBudget: budgetTokens })
  }

  /**
   * Appends content to the user turn at the end of the history, starting a
   * new user turn when the last one is an assistant turn.
   */
  addUser(content: ContentBlock | string): void {
    this._append('user', content)
  }

  /**
   * Appends content to the assistant turn at the end of the history,
   * starting a new assistant turn when the last one is a user turn.
   */
  addAssistant(content: ContentBlock | string): void {
    this._append('assistant', content)
  }

  /**
   * Appends one block to the system prompt.
   */
  addSystem(content: TextBlock | string): void {
    this.system.push(typeof content === 'string' ? new TextBlock(content) : content)
  }

  /**
   * Body of the request in the API's wire format. Empty tool, stop-sequence
   * and system lists, the default tool choice and disabled thinking are
   * omitted.
   */
  toJSON(): WireMessagesRequest {
    const body: WireMessagesRequest = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: this.messages.map(formatMessage),
      stream: this.stream,
    }

    if (this.system.length > 0) body.system = this.system.map(formatContentBlock)
    if (this.temperature !== undefined) body.temperature = this.temperature
    if (this.topK !== undefined) body.top_k = this.topK
    if (this.topP !== undefined) body.top_p = this.topP
    if (this.userId !== undefined) body.metadata = { user_id: this.userId }
    if (this.tools.length > 0) body.tools = this.tools.map(formatTool)
    if (this.toolChoice.type !== 'auto') body.tool_choice = this.toolChoice
    if (this.stopSequences.length > 0) body.stop_sequences = this.stopSequences
    if (this.thinkingBudget !== undefined) body.thinking = { type: 'enabled', budget_tokens: this.thinkingBudget }

    return body
  }

  private _append(role: Role, content: ContentBlock | string): void {
    const block = typeof content === 'string' ? new TextBlock(content) : content
    const last = this.messages.at(-1)
    if (last !== undefined && last.role === role) {
      last.content.push(block)
    } else {
      this.messages.push(new Message({ role, content: [block] }))
    }
  }

  private _with(patch: Partial<MessagesRequestData>): MessagesRequest {
    return new MessagesRequest({ ...this, ...patch })
  }
}
