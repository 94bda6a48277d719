export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)

const envLevel = typeof process !== 'undefined' ? process.env.FLOCK_LOG_LEVEL : undefined

let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
  const prefix = `[${scope}]`
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    },
  }
}
