import type { Usage } from '../models/streaming.js'
import type { ContentBlock, Role, StopReason, ToolUseBlock } from './messages.js'

/**
 * Data for a messages response.
 */
export interface MessagesResponseData {
  id: string
  model: string
  role: Role
  content: ContentBlock[]
  stopReason?: StopReason | undefined
  stopSequence?: string | undefined
  usage: Usage
}

/**
 * A generated turn, either decoded in one piece or accumulated from a stream.
 *
 * While streaming, the stream handle owns the instance and updates it in
 * place after every event. Once the stream has stopped it is not modified
 * again.
 */
export class MessagesResponse implements MessagesResponseData {
  readonly type = 'message' as const

  id: string
  model: string
  role: Role
  content: ContentBlock[]
  stopReason?: StopReason | undefined
  stopSequence?: string | undefined
  usage: Usage

  constructor(data?: Partial<MessagesResponseData>) {
    this.id = data?.id ?? ''
    this.model = data?.model ?? ''
    this.role = data?.role ?? 'assistant'
    this.content = data?.content ?? []
    this.stopReason = data?.stopReason
    this.stopSequence = data?.stopSequence
    this.usage = data?.usage ?? {}
  }

  /**
   * Concatenated text of every text block, in order. Other block kinds are
   * skipped.
   */
  text(): string {
    let text = ''
    for (const block of this.content) {
      if (block.type === 'text') {
        text += block.text
      }
    }
    return text
  }

  /**
   * Tool use blocks the model emitted.
   */
  toolUses(): ToolUseBlock[] {
    return this.content.filter((block): block is ToolUseBlock => block.type === 'tool_use')
  }

  /**
   * Renders all content blocks as readable text.
   *
   * An assistant response made only of text and thinking is written without
   * role prefixes. Anything else (a user-role response, or one containing
   * images, tool uses or tool results) gets `<role>: ` on every line.
   *
   * @example
   * ```typescript
   * new MessagesResponse({ role: 'user', content: [new TextBlock('hello')] }).formatContent()
   * // 'user: hello'
   * ```
   */
  formatContent(): string {
    const showRoles =
      this.role !== 'assistant' || this.content.some((block) => block.type !== 'text' && block.type !== 'thinking')

    const lines: string[] = []
    for (const block of this.content) {
      for (const line of renderBlock(block).split('\n')) {
        lines.push(showRoles ? `${this.role}: ${line}` : line)
      }
    }
    return lines.join('\n').trim()
  }
}

function renderBlock(block: ContentBlock): string {
  switch (block.type) {
    case 'text':
      return block.text
    case 'image':
      return `[Image: ${block.source.type} ${block.source.mediaType}]`
    case 'tool_use':
      return `[Tool Use: ${block.name} (${block.id})] ${JSON.stringify(block.input)}`
    case 'tool_result':
      return `[Tool Result: ${block.toolUseId}${block.isError ? ' (error)' : ''}] ${block.content}`
    case 'thinking':
      return `[Thinking] ${block.thinking}`
  }
}
