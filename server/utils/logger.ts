/**
 * Structured JSON logger — one object per line.
 *
 * Usage:
 *   import { logger } from './logger.ts'
 *   logger.info('Server started', { port: 7891 })
 *
 * Output:
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"info","message":"Server started","port":7891}
 *
 * The level comes from LOG_LEVEL (default "info"); errors go to stderr,
 * everything else to stdout.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogContext = Record<string, unknown>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

/** Unknown or missing values fall back to "info". */
export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What request handlers and services log through: a logger or a child. */
export interface Log {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): Log
}

export class Logger implements Log {
  private threshold: number

  constructor(level?: LogLevel) {
    this.threshold = LEVEL_PRIORITY[level ?? resolveLevel(process.env.LOG_LEVEL)]
  }

  setLevel(level: LogLevel): void {
    this.threshold = LEVEL_PRIORITY[level]
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }
    const line = JSON.stringify(entry) + '\n'

    if (level === 'error') process.stderr.write(line)
    else process.stdout.write(line)
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  /** A logger that adds fixed fields (component, requestId…) to every line. */
  child(defaults: LogContext): Log {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements Log {
  constructor(
    private readonly parent: Log,
    private readonly defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: LogContext): Log {
    return new ChildLogger(this, defaults)
  }
}

/** Formats a thrown value for a log line. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Application-wide logger. */
export const logger = new Logger()
