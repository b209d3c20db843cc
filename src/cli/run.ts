import { ClientError, normalizeError } from '../errors.js'
import { MessagesClient } from '../models/client.js'
import { MessagesRequest } from '../models/request.js'
import type { Usage } from '../models/streaming.js'
import type { ResolvedClientConfig } from '../config.js'
import { ImageBlock } from '../types/messages.js'
import { USAGE, UsageError, parseCliArgs, type CliCommand, type MessageOptions } from './args.js'
import { ConsoleLogger, installConsoleLogger, levelFromFlags, type LogSink, type Logger } from './logger.js'

/**
 * Process surface the CLI runs against.
 */
export interface CliEnvironment {
  env: NodeJS.ProcessEnv
  stdout: { write(chunk: string): unknown }
  stderr: LogSink
  fetch?: typeof globalThis.fetch
}

function processEnvironment(): CliEnvironment {
  return {
    env: process.env,
    stdout: process.stdout,
    stderr: { write: (line) => process.stderr.write(`${line}\n`) },
  }
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the script path
 * @param io - Process surface, the real process by default
 * @returns The exit code
 */
export async function run(argv: string[], io: CliEnvironment = processEnvironment()): Promise<number> {
  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`error: ${error.message}`)
      io.stderr.write(USAGE)
      return 1
    }
    throw error
  }

  const logger = new ConsoleLogger(levelFromFlags(command.global.verbosity, command.global.quiet), io.stderr)
  const restoreConsole = installConsoleLogger(logger)

  try {
    const client = new MessagesClient({ apiKey: command.global.apiKey, env: io.env, fetch: io.fetch })

    switch (command.command) {
      case 'info':
        printInfo(client.getConfig(), io)
        break
      case 'message':
        await sendMessage(client, command.options, io, logger)
        break
    }
    return 0
  } catch (error) {
    logger.error(describeError(error))
    return 1
  } finally {
    restoreConsole()
  }
}

function printInfo(config: ResolvedClientConfig, io: CliEnvironment): void {
  const lines = [
    `api key: ${maskApiKey(config.apiKey)}`,
    `base url: ${config.baseUrl}`,
    `model: ${config.model}`,
    `max tokens: ${config.maxTokens}`,
    `api version: ${config.apiVersion}`,
    `betas: ${config.betas.length > 0 ? config.betas.join(', ') : 'none'}`,
  ]
  io.stdout.write(`${lines.join('\n')}\n`)
}

async function sendMessage(
  client: MessagesClient,
  options: MessageOptions,
  io: CliEnvironment,
  logger: Logger
): Promise<void> {
  let request = new MessagesRequest().withStream(options.stream)
  if (options.model !== undefined) request = request.withModel(options.model)
  if (options.maxTokens !== undefined) request = request.withMaxTokens(options.maxTokens)
  if (options.system !== undefined) request = request.withSystem(options.system)
  if (options.temperature !== undefined) request = request.withTemperature(options.temperature)
  if (options.thinking !== undefined) request = request.withThinking(options.thinking)

  for (const path of options.images) {
    logger.debug(`Attaching image ${path}`)
    request.addUser(await ImageBlock.fromFile(path))
  }
  request.addUser(options.prompt)

  logger.info(`Sending request to ${request.model}`)

  if (!options.stream) {
    const response = await client.messages(request)
    io.stdout.write(`${response.formatContent()}\n`)
    io.stdout.write(`${formatUsage(response.usage)}\n`)
    return
  }

  const stream = client.messagesStream(request)
  for await (const event of stream) {
    switch (event.type) {
      case 'content_block_start':
        if (event.contentBlock.type === 'thinking') io.stdout.write('[Thinking] ')
        break
      case 'content_block_delta':
        if (event.delta.type === 'text_delta') io.stdout.write(event.delta.text)
        if (event.delta.type === 'thinking_delta') io.stdout.write(event.delta.thinking)
        break
      case 'content_block_stop':
        io.stdout.write('\n')
        break
      default:
        break
    }
  }
  io.stdout.write(`${formatUsage(stream.response.usage)}\n`)
}

/**
 * Shows the first and last four characters of a key.
 */
export function maskApiKey(key: string): string {
  return key.length <= 8 ? '*'.repeat(key.length) : `${key.slice(0, 4)}...${key.slice(-4)}`
}

export function formatUsage(usage: Usage): string {
  const parts = [`${usage.inputTokens ?? 0} input tokens`, `${usage.outputTokens ?? 0} output tokens`]
  if (usage.cacheCreationInputTokens !== undefined) parts.push(`${usage.cacheCreationInputTokens} cache write tokens`)
  if (usage.cacheReadInputTokens !== undefined) parts.push(`${usage.cacheReadInputTokens} cache read tokens`)
  return `usage: ${parts.join(', ')}`
}

function describeError(error: unknown): string {
  if (error instanceof ClientError) {
    return `${error.name}: ${error.message}`
  }
  return normalizeError(error).message
}
