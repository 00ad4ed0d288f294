export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export type LogSink = (level: LogLevel, message: string, ...args: unknown[]) => void

export class Logger {
  private level: LogLevel
  private sink: LogSink

  constructor(level: LogLevel = 'info', sink?: LogSink) {
    this.level = level
    this.sink =
      sink ??
      ((lvl, message, ...args) => {
        const timestamp = new Date().toISOString()
        console.error(`[${timestamp}] [${lvl.toUpperCase()}]`, message, ...args)
      })
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  /**
   * Logger sharing this one's sink and level, prefixing every message with `[scope]`.
   */
  scoped(scope: string): Logger {
    return new Logger(this.level, (lvl, message, ...args) =>
      this.log(lvl, `[${scope}] ${message}`, ...args)
    )
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args)
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return
    }
    this.sink(level, message, ...args)
  }
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

const envLevel = process.env.GRAPHWEAVE_LOG_LEVEL

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info')
