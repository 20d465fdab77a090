/**
 * @shopsweep/logger
 *
 * Structured logging shared by the harvester and the db package.
 *
 * - JSON lines in production, colored single-line output in development
 * - Child loggers carry a component path (`harvester:products`) and context
 * - Credential-bearing keys can be redacted before anything is written
 * - Optional file sink (LOG_FILE) receives every entry as a JSON line
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 * - LOG_FILE: path of a file to append JSON lines to (in addition to console)
 * - LOG_REDACT: "false" disables redaction. Default: enabled
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

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
  /** Set from the error argument; a caller may also pass a plain `error` string in meta */
  error?: unknown
  [key: string]: unknown
}

interface LogErrorData {
  name: string
  message: string
  stack?: string
}

function isLogErrorData(value: unknown): value is LogErrorData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  )
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

export const REDACTED = '[REDACTED]'

/**
 * Keys whose values are session secrets or connection strings.
 * Matched case-insensitively against every metadata key, at any depth.
 */
const SENSITIVE_KEYS = new Set([
  'credential',
  'webtoken',
  'web_token',
  'token',
  'password',
  'databaseurl',
  'connectionstring',
  'authorization',
])

let levelOverride: LogLevel | null = null
let redactionOverride: boolean | null = null
let fileSinkReady: string | null = null

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
 * Force the minimum level regardless of LOG_LEVEL. Pass null to go back to the env value.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

/**
 * Force redaction on or off regardless of LOG_REDACT. Pass null to go back to the env value.
 */
export function setRedactionEnabled(enabled: boolean | null): void {
  redactionOverride = enabled
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogErrorData | undefined {
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

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 4 || value === null || typeof value !== 'object') return value
  if (value instanceof Date) return value
  if (Array.isArray(value)) return value.map(item => redactValue(item, depth + 1))

  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    next[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(val, depth + 1)
  }
  return next
}

/**
 * Replace sensitive values in a metadata object. Non-sensitive keys are returned untouched.
 */
export function redactContext(meta: LogContext): LogContext {
  const redacted = redactValue(meta, 0)
  return redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)
    ? { ...redacted }
    : meta
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, ...rest } = entry
  const { error, ...withoutError } = rest

  // Only a structured error moves to its own line; a plain string stays in meta
  const errorData = isLogErrorData(error) ? error : undefined
  const meta = errorData ? withoutError : rest

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = errorData ? `\n  ${DIM}${errorData.stack || errorData.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function writeToFile(entry: LogEntry): void {
  const file = process.env.LOG_FILE
  if (!file) return

  try {
    if (fileSinkReady !== file) {
      mkdirSync(dirname(file), { recursive: true })
      fileSinkReady = file
    }
    appendFileSync(file, `${formatJson(entry)}\n`, 'utf8')
  } catch (error) {
    // The console output below still carries the entry
    console.error(`[logger] failed to write ${file}: ${error instanceof Error ? error.message : String(error)}`)
  }
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

  writeToFile(entry)
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
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
      ...(isRedactionEnabled() ? redactContext(context) : context),
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
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, newComponent, {
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
 * const logger = createLogger('harvester')
 * const tokens = logger.child('tokens')
 * tokens.info('Token extracted', { storeId: 4 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}

/**
 * A logger that drops everything. Handy as a default for library code and tests.
 */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => silentLogger,
}
