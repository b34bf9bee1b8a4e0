/**
 * @kibble/logger
 *
 * Structured logging shared by the catalog packages and the reconciler.
 *
 * - JSON lines in production, coloured single-line output in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and inherited context
 * - Optional redaction of credential-like keys
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 * - LOG_REDACT: "false" disables redaction. Default: enabled
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
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

const REDACTED = '[REDACTED]'

// Keys whose values never reach a log line while redaction is on.
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[-_]?key/i,
  /credential/i,
  /^database[-_]?url$/i,
  /^redis[-_]?url$/i,
]

// Runtime overrides (tests and CLI flags); env vars apply when unset.
let levelOverride: LogLevel | null = null
let redactionOverride: boolean | null = null

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function isRedactionEnabled(): boolean {
  if (redactionOverride !== null) return redactionOverride
  return process.env.LOG_REDACT !== 'false'
}

/**
 * Force the minimum log level, ignoring LOG_LEVEL. Pass null to fall back to the env var.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

/**
 * Force redaction on or off, ignoring LOG_REDACT. Pass null to fall back to the env var.
 */
export function setRedactionEnabled(enabled: boolean | null): void {
  redactionOverride = enabled
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

function redact(context: LogContext): LogContext {
  const next: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    next[key] = SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key)) ? REDACTED : value
  }
  return next
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const { timestamp, level: _level, service, component, message, error, ...meta } = entry
  const componentPath = component ? `${service}:${component}` : service

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

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
   * Create a child logger.
   * A string extends the component path; an object only adds default context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
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

    const context = { ...this.defaultContext, ...meta }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(isRedactionEnabled() ? redact(context) : context),
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
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

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const component = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, component, {
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
 * const logger = createLogger('reconciler')
 * logger.info('Run started', { watermark: '2026-01-01T00:00:00.000Z' })
 *
 * const mergeLog = logger.child('merge')
 * mergeLog.warn('Key collision', { baseKey: 'acme::adult::dry' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
