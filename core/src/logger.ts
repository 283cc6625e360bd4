/**
 * Structured JSON Logger
 *
 * Provides structured JSON logging with support for:
 * - Log levels (debug, info, warn, error)
 * - Timestamps (ISO 8601)
 * - Contextual metadata and component-scoped child loggers
 * - Sanitized error serialization
 *
 * Usage:
 *   import { createLogger, logError } from '@sortid/core'
 *
 *   const log = createLogger({ component: 'Ingest' }, 'debug')
 *   log.info('Generator ready', { shared: true })
 *   logError(log, 'Random source failed', err)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  /** Component/module name */
  component?: string
  /** Additional contextual fields */
  [key: string]: unknown
}

export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string
  /** Log severity level */
  level: LogLevel
  /** Log message */
  message: string
  /** Contextual metadata */
  context?: Record<string, unknown>
}

/** Log level priority for filtering */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(additionalContext: LogContext): Logger
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value)
}

/**
 * Creates a logger instance with optional base context
 */
export function createLogger(baseContext: LogContext = {}, minLevel: LogLevel = 'info'): Logger {
  const minPriority = LOG_LEVEL_PRIORITY[minLevel]

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < minPriority) {
      return
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    const mergedContext = { ...baseContext, ...context }
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext
    }

    const output = JSON.stringify(entry)
    switch (level) {
      case 'debug':
        console.debug(output)
        break
      case 'info':
        console.info(output)
        break
      case 'warn':
        console.warn(output)
        break
      case 'error':
        console.error(output)
        break
    }
  }

  return {
    debug: (message: string, context?: Record<string, unknown>) => log('debug', message, context),
    info: (message: string, context?: Record<string, unknown>) => log('info', message, context),
    warn: (message: string, context?: Record<string, unknown>) => log('warn', message, context),
    error: (message: string, context?: Record<string, unknown>) => log('error', message, context),
    child: (additionalContext: LogContext) =>
      createLogger({ ...baseContext, ...additionalContext }, minLevel),
  }
}

/**
 * Utility to log errors with stack traces (sanitized)
 */
export function logError(
  log: Logger,
  message: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const errorContext: Record<string, unknown> = { ...context }

  if (error instanceof Error) {
    errorContext.error = {
      name: error.name,
      message: sanitize.errorMessage(error.message),
      // first 5 lines only
      stack: sanitize.stackTrace(error.stack),
    }
  } else {
    errorContext.error = sanitize.errorMessage(String(error))
  }

  log.error(message, errorContext)
}

// ============================================================================
// Sanitization
// ============================================================================

export const sanitize = {
  /**
   * Sanitize an error message to remove potential secrets
   * @example sanitize.errorMessage('Auth failed: token=abc123') => 'Auth failed: token=[redacted]'
   */
  errorMessage(message: string | undefined | null): string {
    if (!message) return '[empty]'
    return message
      .replace(/(token|key|secret|password|auth|bearer)[\s:=]+\S+/gi, '$1=[redacted]')
      .replace(/[A-Za-z0-9_-]{32,}/g, '[redacted]')
  },

  /**
   * Sanitize a stack trace to limit depth and remove file paths
   * @param maxLines Maximum number of frames to include
   */
  stackTrace(stack: string | undefined | null, maxLines: number = 5): string {
    if (!stack) return '[no stack]'
    const lines = stack.split('\n').slice(0, maxLines + 1) // +1 for the error message line
    return lines
      .map(line => line.replace(/\(\/[^)]+\/([^/]+)\)/g, '($1)'))
      .join('\n')
  },
}
