/**
 * Command line parsing for `parley`.
 */

import { parseArgs } from 'node:util'
import { z } from 'zod'

export const USAGE = `Usage: parley [--api-key KEY] [-v...] [-q] <command>

Commands:
  info                      Print the resolved client configuration
  message [options] <prompt...>
                            Send one user turn and print the reply

Message options:
  --model M                 Model to use
  --max-tokens N            Max-token budget
  --system S                System prompt
  --temperature T           Sampling temperature, 0 to 1
  --thinking BUDGET         Enable extended thinking with this token budget
  --image PATH              Attach an image (repeatable)
  --stream                  Print the reply as it is generated`

/**
 * Invalid command line.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Options shared by every command.
 */
export interface GlobalOptions {
  apiKey?: string | undefined
  verbosity: number
  quiet: boolean
}

/**
 * Options of the `message` command.
 */
export interface MessageOptions {
  prompt: string
  model?: string | undefined
  maxTokens?: number | undefined
  system?: string | undefined
  temperature?: number | undefined
  thinking?: number | undefined
  images: string[]
  stream: boolean
}

export type CliCommand =
  | { command: 'info'; global: GlobalOptions }
  | { command: 'message'; global: GlobalOptions; options: MessageOptions }

const OPTIONS = {
  'api-key': { type: 'string' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  quiet: { type: 'boolean', short: 'q' },
  model: { type: 'string' },
  'max-tokens': { type: 'string' },
  system: { type: 'string' },
  temperature: { type: 'string' },
  thinking: { type: 'string' },
  image: { type: 'string', multiple: true },
  stream: { type: 'boolean' },
} as const

const MESSAGE_ONLY = ['model', 'max-tokens', 'system', 'temperature', 'thinking', 'image', 'stream'] as const

const valuesSchema = z.object({
  'api-key': z.string().min(1).optional(),
  verbose: z.array(z.boolean()).optional(),
  quiet: z.boolean().optional(),
  model: z.string().min(1).optional(),
  'max-tokens': z.coerce.number().int().positive().optional(),
  system: z.string().optional(),
  temperature: z.coerce.number().min(0).max(1).optional(),
  thinking: z.coerce.number().int().positive().optional(),
  image: z.array(z.string().min(1)).optional(),
  stream: z.boolean().optional(),
})

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true })
  } catch (error) {
    // parseArgs reports unknown options and missing values as TypeError
    throw new UsageError(error instanceof Error ? error.message : String(error))
  }
}

/**
 * Parses the arguments after the script path.
 *
 * @param argv - Arguments, e.g. `process.argv.slice(2)`
 * @returns The command to run
 * @throws \{UsageError\} When the arguments do not form a valid command
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const parsed = parseRaw(argv)
  const result = valuesSchema.safeParse(parsed.values)
  if (!result.success) {
    throw new UsageError(`Invalid options:\n${z.prettifyError(result.error)}`)
  }
  const values = result.data

  const global: GlobalOptions = {
    apiKey: values['api-key'],
    verbosity: values.verbose?.length ?? 0,
    quiet: values.quiet ?? false,
  }

  const [command, ...rest] = parsed.positionals
  switch (command) {
    case 'info': {
      const misplaced = MESSAGE_ONLY.find((name) => values[name] !== undefined)
      if (misplaced !== undefined) {
        throw new UsageError(`Option '--${misplaced}' only applies to the message command`)
      }
      if (rest.length > 0) {
        throw new UsageError(`Unexpected argument '${rest[0]}' for info`)
      }
      return { command: 'info', global }
    }

    case 'message': {
      const prompt = rest.join(' ').trim()
      if (prompt === '') {
        throw new UsageError('The message command needs a prompt')
      }
      return {
        command: 'message',
        global,
        options: {
          prompt,
          model: values.model,
          maxTokens: values['max-tokens'],
          system: values.system,
          temperature: values.temperature,
          thinking: values.thinking,
          images: values.image ?? [],
          stream: values.stream ?? false,
        },
      }
    }

    case undefined:
      throw new UsageError('Missing command')

    default:
      throw new UsageError(`Unknown command '${command}'`)
  }
}
