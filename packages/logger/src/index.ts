/**
 * @p2000-monitor/logger
 *
 * Structured logging for the P2000 monitor processes.
 *
 * - JSON lines in production, colored single lines in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and default metadata
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal (default: info)
 * - LOG_FORMAT: json | pretty (default: json when NODE_ENV=production, pretty otherwise)
 *
 * `setLogLevel` / `setLogFormat` override the environment at runtime (tests, CLI flags).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

let levelOverride: LogLevel | null = null
let formatOverride: LogFormat | null = null

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to fall back to the environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function setLogFormat(format: LogFormat | null): void {
  formatOverride = format
}

export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (level && isLogLevel(level)) {
    return level
  }
  return 'info'
}

export function getLogFormat(): LogFormat {
  if (formatOverride) return formatOverride
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry, colors = true): string {
  const paint = (code: string, text: string) => (colors ? `${code}${text}${RESET}` : text)
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level, service, component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${paint(DIM, JSON.stringify(meta))}` : ''
  const errorStr = error ? `\n  ${paint(DIM, error.stack ?? error.message)}` : ''

  return `${paint(DIM, timestamp)} ${paint(LOG_COLORS[level] + BRIGHT, levelStr)} ${paint(DIM, `[${componentPath}]`)} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. The component name is appended to the parent's
   * component path (`coordinator:utrecht`); context is merged into every entry.
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined && error !== null) {
      entry.error = formatError(error)
    }

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, path, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('poller')
 * logger.info('POLLER_STARTED', { regions: 2 })
 *
 * const log = logger.child('coordinator', { regionPath: 'utrecht' })
 * log.warn('POLL_FAILED', { reason: 'timeout' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
