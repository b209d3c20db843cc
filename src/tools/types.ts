import type { JSONSchema } from '../types/json.js'

/**
 * A tool defined by the caller, described by a JSON Schema for its input.
 */
export interface CustomTool {
  type: 'custom'

  /**
   * Name the model uses to invoke the tool.
   */
  name: string

  /**
   * What the tool does and when to use it.
   */
  description: string

  /**
   * JSON Schema of the tool's input.
   */
  inputSchema: JSONSchema
}

/**
 * Wire type and name of a text editor tool version.
 */
export interface TextEditorVersion {
  type: string
  name: string
}

/**
 * Text editor tool for Claude 3.7 models.
 */
export const TEXT_EDITOR_37 = {
  type: 'text_editor_20250124',
  name: 'str_replace_editor',
} as const satisfies TextEditorVersion

/**
 * Text editor tool for Claude 4 models.
 */
export const TEXT_EDITOR_4 = {
  type: 'text_editor_20250429',
  name: 'str_replace_based_edit_tool',
} as const satisfies TextEditorVersion

/**
 * The built-in text editor tool. Its schema is defined by the API.
 */
export interface TextEditorTool {
  type: 'text_editor'
  version: TextEditorVersion
}

/**
 * A tool declared on a request.
 */
export type Tool = CustomTool | TextEditorTool

/**
 * How the model may choose tools.
 *
 * - `auto` - the model decides (default)
 * - `any` - the model must use some tool
 * - `tool` - the model must use the named tool
 * - `none` - the model must not use tools
 */
export type ToolChoice = { type: 'auto' } | { type: 'any' } | { type: 'tool'; name: string } | { type: 'none' }

/**
 * Tool declaration as sent on the wire.
 */
export type WireTool = { name: string; description: string; input_schema: JSONSchema } | { type: string; name: string }

/**
 * Formats a tool declaration for the API.
 *
 * @param tool - Tool declaration
 * @returns Wire-formatted tool
 */
export function formatTool(tool: Tool): WireTool {
  switch (tool.type) {
    case 'custom':
      return { name: tool.name, description: tool.description, input_schema: tool.inputSchema }
    case 'text_editor':
      return { type: tool.version.type, name: tool.version.name }
  }
}
