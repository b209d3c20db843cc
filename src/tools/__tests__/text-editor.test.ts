import { describe, it, expect } from 'vitest'
import { ResponseParseError } from '../../errors.js'
import { parseTextEditorCommand } from '../text-editor.js'

describe('parseTextEditorCommand', () => {
  it('parses a view command with a range', () => {
    expect(parseTextEditorCommand({ command: 'view', path: 'src/main.ts', view_range: [1, -1] })).toEqual({
      command: 'view',
      path: 'src/main.ts',
      view_range: [1, -1],
    })
  })

  it('defaults the replacement of str_replace to an empty string', () => {
    expect(parseTextEditorCommand({ command: 'str_replace', path: 'a.txt', old_str: 'remove me' })).toEqual({
      command: 'str_replace',
      path: 'a.txt',
      old_str: 'remove me',
      new_str: '',
    })
  })

  it('parses create and insert commands', () => {
    expect(parseTextEditorCommand({ command: 'create', path: 'b.txt', file_text: 'hi\n' })).toEqual({
      command: 'create',
      path: 'b.txt',
      file_text: 'hi\n',
    })
    expect(parseTextEditorCommand({ command: 'insert', path: 'b.txt', insert_line: 0, new_str: 'top' })).toEqual({
      command: 'insert',
      path: 'b.txt',
      insert_line: 0,
      new_str: 'top',
    })
  })

  it('parses undo_edit', () => {
    expect(parseTextEditorCommand({ command: 'undo_edit', path: 'b.txt' })).toEqual({
      command: 'undo_edit',
      path: 'b.txt',
    })
  })

  it('rejects an unknown command', () => {
    expect(() => parseTextEditorCommand({ command: 'delete', path: 'b.txt' })).toThrow(ResponseParseError)
  })

  it('rejects a negative insert line', () => {
    expect(() => parseTextEditorCommand({ command: 'insert', path: 'b.txt', insert_line: -1, new_str: 'x' })).toThrow(
      /^Invalid text editor command:/
    )
  })
})
