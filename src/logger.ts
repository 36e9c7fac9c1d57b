/* eslint-disable no-console */
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.gray('debug'),
  info: pc.blue('info'),
  warn: pc.yellow('warn'),
  error: pc.red('error'),
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value)
}

/**
 * Writes to stderr so that stdout stays free for machine-readable output
 */
export class Logger {
  private level: LogLevel
  private prefix: string

  constructor(prefix = 'joulebench', level?: LogLevel) {
    const fromEnv = process.env.JOULEBENCH_LOG_LEVEL?.toLowerCase()
    this.prefix = prefix
    this.level = level ?? (isLogLevel(fromEnv) ? fromEnv : 'info')
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args)
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return
    }
    console.error(`${pc.dim(`[${this.prefix}]`)} ${LABELS[level]} ${message}`, ...args)
  }
}

export const logger = new Logger()
