/**
 * Logging interfaces
 */

import { getDebugInfo } from "./index.js"
import { HiResClock, type Timestamp } from "./time.js"
import type { Optional } from "./type/utils.js"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

let DEFAULT_LOG_LEVEL: LogLevel = LogLevel.WARN

/**
 * Levels to strings
 */
const ReadableLogLevels = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
} as const

/**
 * Parse a level name (case insensitive) such as `debug` or `WARN`
 *
 * @param value The name to parse
 * @returns The matching {@link LogLevel} or undefined if not recognized
 */
export function parseLogLevel(value: string): Optional<LogLevel> {
  switch (value.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG
    case "INFO":
      return LogLevel.INFO
    case "WARN":
    case "WARNING":
      return LogLevel.WARN
    case "ERROR":
      return LogLevel.ERROR
    case "FATAL":
      return LogLevel.FATAL
  }

  return
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Render the optional context attached to a log entry
 */
function formatContext(context: unknown): string {
  if (context === undefined) {
    return ""
  }

  if (context instanceof Error) {
    return ` (${context.name}: ${context.message})`
  }

  return ` ${getDebugInfo(context)}`
}

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level, message and context
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}${formatContext(data.context)}`

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

/**
 * {@link LogWriter} that writes to stderr so stdout stays reserved for reports
 */
export class ConsoleLogWriter implements LogWriter {
  private readonly _formatter: LogFormatter
  private readonly _stream: NodeJS.WritableStream

  constructor(formatter?: LogFormatter, stream?: NodeJS.WritableStream) {
    this._formatter = formatter ?? SimpleLogFormatter
    this._stream = stream ?? process.stderr
  }

  log(data: LogData): void {
    this._stream.write(`${this._formatter(data)}\n`)
  }
}

let DEFAULT_WRITER: LogWriter = NoopLogWriter

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  debug(message: string, context?: unknown): void
  info(message: string, context?: unknown): void
  warn(message: string, context?: unknown): void
  error(message: string, context?: unknown): void
  fatal(message: string, context?: unknown): void
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is the current default level */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter}, default is the current default writer */
  writer?: LogWriter
}

type MessageLogger = (message: string, context?: unknown) => void
const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that rebinds its level methods so disabled levels cost nothing
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private readonly _writer: LogWriter
  readonly name?: string

  debug: MessageLogger = NO_OP_LOGGER
  info: MessageLogger = NO_OP_LOGGER
  warn: MessageLogger = NO_OP_LOGGER
  error: MessageLogger = NO_OP_LOGGER
  fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? DEFAULT_LOG_LEVEL
    this._writer = options?.writer ?? DEFAULT_WRITER
    this.name = options?.name
    this.fatal = this._writerFor(LogLevel.FATAL)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level
    this.debug = NO_OP_LOGGER
    this.info = NO_OP_LOGGER
    this.warn = NO_OP_LOGGER
    this.error = NO_OP_LOGGER

    switch (level) {
      case LogLevel.DEBUG:
        this.debug = this._writerFor(LogLevel.DEBUG)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.INFO:
        this.info = this._writerFor(LogLevel.INFO)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.WARN:
        this.warn = this._writerFor(LogLevel.WARN)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.ERROR:
        this.error = this._writerFor(LogLevel.ERROR)
        break
    }
  }

  private _writerFor(level: LogLevel): MessageLogger {
    return (message: string, context?: unknown): void => {
      this._writer.log({
        source: this.name,
        timestamp: HiResClock.timestamp(),
        message,
        level,
        context,
      })
    }
  }
}

let GLOBAL_LOGGER: Logger = new DefaultLogger({
  name: "global",
  writer: NoopLogWriter,
})

/**
 * Replace the writer and level used by the global logger and by any logger
 * created afterwards without explicit options
 *
 * @param writer The {@link LogWriter} to use
 * @param level The {@link LogLevel} to use
 */
export function configureLogging(writer: LogWriter, level: LogLevel): void {
  DEFAULT_WRITER = writer
  DEFAULT_LOG_LEVEL = level
  GLOBAL_LOGGER = new DefaultLogger({ name: "global", writer, level })
}

/**
 * Helper function that uses the global logger
 */
export function debug(message: string, context?: unknown): void {
  GLOBAL_LOGGER.debug(message, context)
}

/**
 * Helper function that uses the global logger
 */
export function warn(message: string, context?: unknown): void {
  GLOBAL_LOGGER.warn(message, context)
}

/**
 * Helper function that uses the global logger
 */
export function error(message: string, context?: unknown): void {
  GLOBAL_LOGGER.error(message, context)
}

/**
 * Helper function that uses the global logger
 */
export function fatal(message: string, context?: unknown): void {
  GLOBAL_LOGGER.fatal(message, context)
}
