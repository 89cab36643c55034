/**
 * Logging interfaces
 */

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

let DEFAULT_LOG_LEVEL: LogLevel = LogLevel.INFO

export function setDefaultLogLevel(level: LogLevel): void {
  DEFAULT_LOG_LEVEL = level
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Date
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level and message
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}`

/**
 * Formats {@link LogData} as a single line of JSON, with the context rendered
 * through {@link describeContext}
 *
 * @param data The {@link LogData} to format
 * @returns A JSON line
 */
export const JsonLogFormatter: LogFormatter = (data: LogData) =>
  JSON.stringify({
    time: data.timestamp?.toISOString(),
    level: ReadableLogLevels[data.level],
    source: data.source,
    message: data.message,
    context: describeContext(data.context),
  })

/**
 * Errors don't serialize their message or stack so pull those out explicitly
 */
function describeContext(context: unknown): unknown {
  if (context instanceof Error) {
    return { name: context.name, message: context.message }
  }

  return context
}

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

let DEFAULT_WRITER: LogWriter = NoopLogWriter

/**
 * Sets the default log writer for new loggers and the global logger
 *
 * @param writer The {@link LogWriter} to use for new log creation
 */
export function setDefaultWriter(writer: LogWriter): void {
  DEFAULT_WRITER = writer

  GLOBAL_LOGGER = new DefaultLogger({
    name: GLOBAL_LOGGER.name,
    writer,
    level: GLOBAL_LOGGER.level,
  })
}

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
  /** Optional {@link LogLevel} for initial logging, default is {@link LogLevel.INFO} */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter}, default is whatever {@link setDefaultWriter} installed */
  writer?: LogWriter
}

/**
 * Simple {@link LogWriter} that outputs to the console, errors go to stderr
 */
export class ConsoleLogWriter implements LogWriter {
  private _formatter: LogFormatter

  constructor(formatter?: LogFormatter) {
    this._formatter = formatter ?? SimpleLogFormatter
  }

  log(data: LogData): void {
    if (data.level <= LogLevel.WARN) {
      // eslint-disable-next-line no-console
      console.error(this._formatter(data))
    } else {
      // eslint-disable-next-line no-console
      console.log(this._formatter(data))
    }
  }
}

/**
 * {@link LogWriter} that keeps everything in memory, mostly for tests
 */
export class MemoryLogWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }

  /**
   * @param level The {@link LogLevel} to filter on
   * @returns The messages written at exactly that level
   */
  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message)
  }
}

type MessageLogger = (message: string, context?: unknown) => void
const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that translates between levels, statements below the current
 * level are bound to a no-op
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private _writer: LogWriter
  readonly name?: string

  debug: MessageLogger
  info: MessageLogger
  warn: MessageLogger
  error: MessageLogger
  fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? DEFAULT_LOG_LEVEL
    this._writer = options?.writer ?? DEFAULT_WRITER
    this.name = options?.name

    this.debug = NO_OP_LOGGER
    this.info = NO_OP_LOGGER
    this.warn = NO_OP_LOGGER
    this.error = NO_OP_LOGGER
    this.fatal = (message, context) =>
      this._write(LogLevel.FATAL, message, context)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level

    this.debug =
      level >= LogLevel.DEBUG
        ? (message, context) => this._write(LogLevel.DEBUG, message, context)
        : NO_OP_LOGGER
    this.info =
      level >= LogLevel.INFO
        ? (message, context) => this._write(LogLevel.INFO, message, context)
        : NO_OP_LOGGER
    this.warn =
      level >= LogLevel.WARN
        ? (message, context) => this._write(LogLevel.WARN, message, context)
        : NO_OP_LOGGER
    this.error =
      level >= LogLevel.ERROR
        ? (message, context) => this._write(LogLevel.ERROR, message, context)
        : NO_OP_LOGGER
  }

  private _write(level: LogLevel, message: string, context?: unknown): void {
    this._writer.log({
      source: this.name,
      timestamp: new Date(),
      message,
      level,
      context,
    })
  }
}

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
 * Parse a level name (case insensitive) into a {@link LogLevel}
 *
 * @param value The name to parse
 * @returns The matching {@link LogLevel} or undefined
 */
export function parseLogLevel(value: string): LogLevel | undefined {
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
    default:
      return
  }
}

/**
 * Attempts to update the global logging levels
 *
 * @param level The new {@link LogLevel} to set globally
 */
export function setGlobalLogLevel(level: LogLevel): void {
  GLOBAL_LOGGER.setLevel(level)
}

/**
 * Allows customization of the global logger
 *
 * @param logger The {@link Logger} to use for global operations
 */
export function setGlobalLogger(logger: Logger): void {
  GLOBAL_LOGGER = logger
}

export function debug(message: string, context?: unknown) {
  GLOBAL_LOGGER.debug(message, context)
}

export function info(message: string, context?: unknown) {
  GLOBAL_LOGGER.info(message, context)
}

export function warn(message: string, context?: unknown) {
  GLOBAL_LOGGER.warn(message, context)
}

export function error(message: string, context?: unknown) {
  GLOBAL_LOGGER.error(message, context)
}

export function fatal(message: string, context?: unknown) {
  GLOBAL_LOGGER.fatal(message, context)
}

let GLOBAL_LOGGER: Logger = new DefaultLogger({
  name: "global",
  writer: NoopLogWriter,
})
