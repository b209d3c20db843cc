/**
 * Main entry point for the Parley SDK.
 *
 * This is the primary export module for the SDK, providing access to all
 * public APIs and functionality.
 */

// Client
export { MessagesClient } from './models/client.js'
export type { MessagesClientOptions, RequestOptions } from './models/client.js'

// Configuration
export {
  API_KEY_ENV,
  DEFAULT_API_VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  resolveApiKey,
  resolveClientConfig,
} from './config.js'
export type { ClientConfig, ResolvedClientConfig } from './config.js'

// Error types
export {
  ClientError,
  BadRequestError,
  UnauthorizedError,
  RateLimitedError,
  OverloadedError,
  ApiError,
  UnknownApiError,
  ResponseParseError,
  TransportError,
  StreamError,
  ConfigError,
  UnsupportedOperationError,
  classifyApiError,
} from './errors.js'
export type { ClientErrorKind } from './errors.js'

// JSON types
export type { JSONSchema, JSONValue } from './types/json.js'

// Message types
export type {
  Role,
  StopReason,
  CacheControl,
  TextBlockData,
  ImageSource,
  ImageBlockData,
  ToolUseBlockData,
  ToolResultBlockData,
  ThinkingBlockData,
  ContentBlock,
  ContentBlockData,
  MessageData,
} from './types/messages.js'

// Message classes
export {
  TextBlock,
  ImageBlock,
  ToolUseBlock,
  ToolResultBlock,
  ThinkingBlock,
  Message,
  contentBlockFromData,
  mediaTypeForPath,
} from './types/messages.js'

// Request and response
export { MessagesRequest } from './models/request.js'
export type { MessagesRequestData, WireMessagesRequest } from './models/request.js'
export { MessagesResponse } from './types/response.js'
export type { MessagesResponseData } from './types/response.js'

// Tool types
export type { Tool, CustomTool, TextEditorTool, TextEditorVersion, ToolChoice } from './tools/types.js'
export { TEXT_EDITOR_37, TEXT_EDITOR_4 } from './tools/types.js'

// Tool factory function
export { tool } from './tools/zod-tool.js'
export type { ZodTool, ZodToolConfig } from './tools/zod-tool.js'

// Text editor commands
export { parseTextEditorCommand } from './tools/text-editor.js'
export type {
  TextEditorCommand,
  ViewCommand,
  StrReplaceCommand,
  CreateCommand,
  InsertCommand,
  UndoEditCommand,
} from './tools/text-editor.js'

// Streaming event types
export type {
  StreamEvent,
  MessageStartEvent,
  ContentBlockStartEvent,
  ContentBlockDeltaEvent,
  ContentBlockStopEvent,
  MessageDeltaEvent,
  MessageStopEvent,
  PingEvent,
  ErrorEvent,
  ContentBlockDelta,
  TextDelta,
  ThinkingDelta,
  SignatureDelta,
  InputJsonDelta,
  Usage,
} from './models/streaming.js'
export { mergeUsage } from './models/streaming.js'

// Stream handle and merge engine
export { MessageStream } from './models/message-stream.js'
export type { StreamOpener } from './models/message-stream.js'
export { mergeStreamEvent, foldStreamEvents } from './models/stream-merge.js'
export type { MergeOutcome } from './models/stream-merge.js'
