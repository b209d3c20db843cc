import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import type { JSONValue } from './json.js'

/**
 * Content and message types.
 *
 * This module follows a pattern where <name>Data interfaces define the structure
 * for objects, while corresponding classes extend those interfaces with additional
 * functionality and type discrimination.
 */

/**
 * Role of a participant in a conversation.
 */
export type Role = 'user' | 'assistant'

/**
 * Reason the model stopped generating.
 *
 * - `end_turn` - Natural end of the model's turn
 * - `max_tokens` - The max-token budget was exhausted
 * - `stop_sequence` - One of the request's stop sequences was produced
 * - `tool_use` - The model wants to use a tool
 */
export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use'

/**
 * Prompt caching marker attached to a text block.
 */
export interface CacheControl {
  type: 'ephemeral'
}

/**
 * Data for a text block.
 */
export interface TextBlockData {
  /**
   * Plain text content.
   */
  text: string

  /**
   * Marks the prompt prefix ending at this block as cacheable.
   */
  cacheControl?: CacheControl
}

/**
 * Text content within a message.
 */
export class TextBlock implements TextBlockData {
  /**
   * Discriminator for text content.
   */
  readonly type = 'text' as const

  readonly text: string

  readonly cacheControl?: CacheControl

  constructor(data: TextBlockData | string) {
    if (typeof data === 'string') {
      this.text = data
    } else {
      this.text = data.text
      if (data.cacheControl !== undefined) {
        this.cacheControl = data.cacheControl
      }
    }
  }

  /**
   * Returns a copy of this block tagged for prompt caching.
   */
  withCacheControl(): TextBlock {
    return new TextBlock({ text: this.text, cacheControl: { type: 'ephemeral' } })
  }
}

/**
 * Encoded payload of an image block.
 */
export interface ImageSource {
  /**
   * Encoding of `data`. Only base64 is produced by this client.
   */
  type: 'base64'

  /**
   * MIME type of the image, e.g. `image/png`.
   */
  mediaType: string

  /**
   * Base64 encoded image bytes.
   */
  data: string
}

/**
 * Data for an image block.
 */
export interface ImageBlockData {
  source: ImageSource
}

/**
 * MIME types inferred from image file extensions.
 */
const IMAGE_MEDIA_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
}

/**
 * MIME type used when the extension is not a known image type.
 */
export const FALLBACK_MEDIA_TYPE = 'application/octet-stream'

/**
 * Infers an image MIME type from a file path.
 *
 * @param path - File path, only the extension is inspected
 * @returns The MIME type, or {@link FALLBACK_MEDIA_TYPE}
 */
export function mediaTypeForPath(path: string): string {
  const extension = extname(path).slice(1).toLowerCase()
  return IMAGE_MEDIA_TYPES[extension] ?? FALLBACK_MEDIA_TYPE
}

/**
 * Image content within a message.
 */
export class ImageBlock implements ImageBlockData {
  /**
   * Discriminator for image content.
   */
  readonly type = 'image' as const

  readonly source: ImageSource

  constructor(data: ImageBlockData) {
    this.source = data.source
  }

  /**
   * Reads an image file and wraps it as a base64 image block.
   *
   * @param path - Path to the image file
   * @returns The image block
   * @throws The underlying I/O error when the file cannot be read
   */
  static async fromFile(path: string): Promise<ImageBlock> {
    const bytes = await readFile(path)
    return new ImageBlock({
      source: { type: 'base64', mediaType: mediaTypeForPath(path), data: bytes.toString('base64') },
    })
  }
}

/**
 * Data for a tool use block.
 */
export interface ToolUseBlockData {
  /**
   * Identifier of this invocation, echoed back by the tool result.
   */
  id: string

  /**
   * Name of the tool being invoked.
   */
  name: string

  /**
   * Arguments for the tool.
   */
  input: JSONValue
}

/**
 * The model's request to invoke a tool.
 */
export class ToolUseBlock implements ToolUseBlockData {
  /**
   * Discriminator for tool use content.
   */
  readonly type = 'tool_use' as const

  readonly id: string

  readonly name: string

  readonly input: JSONValue

  constructor(data: ToolUseBlockData) {
    this.id = data.id
    this.name = data.name
    this.input = data.input
  }
}

/**
 * Data for a tool result block.
 */
export interface ToolResultBlockData {
  /**
   * Identifier of the tool use this result answers.
   */
  toolUseId: string

  /**
   * Textual output of the tool.
   */
  content: string

  /**
   * Whether the tool failed.
   */
  isError: boolean
}

/**
 * The result of executing a tool, sent back in a user turn.
 */
export class ToolResultBlock implements ToolResultBlockData {
  /**
   * Discriminator for tool result content.
   */
  readonly type = 'tool_result' as const

  readonly toolUseId: string

  readonly content: string

  readonly isError: boolean

  constructor(data: ToolResultBlockData) {
    this.toolUseId = data.toolUseId
    this.content = data.content
    this.isError = data.isError
  }

  /**
   * Creates a result that answers the given tool use.
   *
   * @param toolUse - The tool use being answered
   * @param content - Tool output
   * @param isError - Whether the tool failed
   */
  static forToolUse(toolUse: ToolUseBlockData, content: string, isError = false): ToolResultBlock {
    return new ToolResultBlock({ toolUseId: toolUse.id, content, isError })
  }
}

/**
 * Data for a thinking block.
 */
export interface ThinkingBlockData {
  /**
   * The reasoning trace.
   */
  thinking: string

  /**
   * Integrity signature, present once the block is complete.
   */
  signature?: string
}

/**
 * Extended thinking produced by the model before its answer.
 */
export class ThinkingBlock implements ThinkingBlockData {
  /**
   * Discriminator for thinking content.
   */
  readonly type = 'thinking' as const

  readonly thinking: string

  readonly signature?: string

  constructor(data: ThinkingBlockData) {
    this.thinking = data.thinking
    if (data.signature !== undefined) {
      this.signature = data.signature
    }
  }
}

/**
 * A block of content within a message.
 * This is a discriminated union; switch on `type` for exhaustive handling.
 */
export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock | ThinkingBlock

/**
 * Plain-data form of {@link ContentBlock}.
 */
export type ContentBlockData =
  | ({ type: 'text' } & TextBlockData)
  | ({ type: 'image' } & ImageBlockData)
  | ({ type: 'tool_use' } & ToolUseBlockData)
  | ({ type: 'tool_result' } & ToolResultBlockData)
  | ({ type: 'thinking' } & ThinkingBlockData)

/**
 * Builds a content block class instance from its plain-data form.
 *
 * @param data - Content block data
 * @returns The matching class instance
 */
export function contentBlockFromData(data: ContentBlockData): ContentBlock {
  switch (data.type) {
    case 'text':
      return new TextBlock(data)
    case 'image':
      return new ImageBlock(data)
    case 'tool_use':
      return new ToolUseBlock(data)
    case 'tool_result':
      return new ToolResultBlock(data)
    case 'thinking':
      return new ThinkingBlock(data)
  }
}

/**
 * Data for a message.
 */
export interface MessageData {
  role: Role
  content: ContentBlockData[]
}

/**
 * A single turn in a conversation.
 */
export class Message {
  /**
   * Discriminator for messages.
   */
  readonly type = 'message' as const

  readonly role: Role

  /**
   * Content blocks in order. The array is appended to while a request is
   * being built; see `MessagesRequest.addUser`.
   */
  readonly content: ContentBlock[]

  constructor(data: { role: Role; content: ContentBlock[] }) {
    this.role = data.role
    this.content = data.content
  }

  /**
   * Creates a Message from plain data.
   *
   * @param data - Message data
   */
  static fromMessageData(data: MessageData): Message {
    return new Message({ role: data.role, content: data.content.map(contentBlockFromData) })
  }
}
