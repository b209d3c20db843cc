/**
 * Leveled console logging for the command line.
 *
 * The library reports anomalies through `console.warn` and `console.debug`;
 * the CLI routes those calls through a {@link ConsoleLogger} so `-v` and `-q`
 * control what reaches stderr.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Destination of log lines.
 */
export interface LogSink {
  write(line: string): void
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: Error): void
}

export class ConsoleLogger implements Logger {
  readonly minLevel: LogLevel
  private readonly _sink: LogSink

  constructor(minLevel: LogLevel = LogLevel.WARN, sink: LogSink = { write: (line) => console.error(line) }) {
    this.minLevel = minLevel
    this._sink = sink
  }

  debug(message: string): void {
    this._log(LogLevel.DEBUG, message)
  }

  info(message: string): void {
    this._log(LogLevel.INFO, message)
  }

  warn(message: string): void {
    this._log(LogLevel.WARN, message)
  }

  error(message: string, error?: Error): void {
    this._log(LogLevel.ERROR, error ? `${message}: ${error.message}` : message)
  }

  private _log(level: LogLevel, message: string): void {
    if (level < this.minLevel) {
      return
    }
    this._sink.write(`${LogLevel[level].toLowerCase()}: ${message}`)
  }
}

/**
 * Maps the `-v` count and `-q` flag to a level.
 *
 * Warnings show by default, `-v` adds info, `-vv` adds debug, `-q` leaves
 * only errors.
 */
export function levelFromFlags(verbosity: number, quiet: boolean): LogLevel {
  if (quiet) {
    return LogLevel.ERROR
  }
  if (verbosity >= 2) {
    return LogLevel.DEBUG
  }
  return verbosity === 1 ? LogLevel.INFO : LogLevel.WARN
}

/**
 * Routes `console.debug`, `console.info` and `console.warn` through a logger.
 *
 * @returns Function that restores the original console methods
 */
export function installConsoleLogger(logger: Logger): () => void {
  const { debug, info, warn } = console
  console.debug = (...args: unknown[]) => logger.debug(args.map(String).join(' '))
  console.info = (...args: unknown[]) => logger.info(args.map(String).join(' '))
  console.warn = (...args: unknown[]) => logger.warn(args.map(String).join(' '))
  return () => {
    console.debug = debug
    console.info = info
    console.warn = warn
  }
}
