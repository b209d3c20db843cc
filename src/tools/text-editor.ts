import { z } from 'zod'
import { ResponseParseError } from '../errors.js'
import type { JSONValue } from '../types/json.js'

/**
 * Input for the view command.
 */
export interface ViewCommand {
  command: 'view'
  path: string
  /**
   * 1-based inclusive line range; `-1` as the end means end of file.
   */
  view_range?: [number, number]
}

/**
 * Input for the str_replace command.
 */
export interface StrReplaceCommand {
  command: 'str_replace'
  path: string
  old_str: string
  new_str: string
}

/**
 * Input for the create command.
 */
export interface CreateCommand {
  command: 'create'
  path: string
  file_text: string
}

/**
 * Input for the insert command.
 */
export interface InsertCommand {
  command: 'insert'
  path: string
  insert_line: number
  new_str: string
}

/**
 * Input for the undo_edit command. Only issued by the Claude 3.7 tool version.
 */
export interface UndoEditCommand {
  command: 'undo_edit'
  path: string
}

/**
 * Union type of all text editor commands.
 */
export type TextEditorCommand = ViewCommand | StrReplaceCommand | CreateCommand | InsertCommand | UndoEditCommand

const textEditorCommandSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('view'),
    path: z.string(),
    view_range: z.tuple([z.number().int(), z.number().int()]).optional(),
  }),
  z.object({
    command: z.literal('str_replace'),
    path: z.string(),
    old_str: z.string(),
    new_str: z.string().default(''),
  }),
  z.object({
    command: z.literal('create'),
    path: z.string(),
    file_text: z.string(),
  }),
  z.object({
    command: z.literal('insert'),
    path: z.string(),
    insert_line: z.number().int().nonnegative(),
    new_str: z.string(),
  }),
  z.object({
    command: z.literal('undo_edit'),
    path: z.string(),
  }),
])

/**
 * Parses the input of a text editor tool use.
 *
 * @param input - `input` of the tool use block
 * @returns The command
 * @throws \{ResponseParseError\} When the input is not a known command
 */
export function parseTextEditorCommand(input: JSONValue): TextEditorCommand {
  const result = textEditorCommandSchema.safeParse(input)
  if (!result.success) {
    throw new ResponseParseError(`Invalid text editor command:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }
  return result.data
}
