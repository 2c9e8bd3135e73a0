const PREFIX = '[ruckus-one]'

export type TLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<TLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string | undefined): value is TLogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

const envLevel = process.env.RUCKUS_ONE_LOG_LEVEL?.toLowerCase()
let currentLevel: TLogLevel = isLogLevel(envLevel) ? envLevel : 'warn'

export function setLogLevel(level: TLogLevel): void {
  currentLevel = level
}

export function getLogLevel(): TLogLevel {
  return currentLevel
}

function enabled(level: TLogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(PREFIX, message, ...args)
  },

  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.info(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(PREFIX, message, ...args)
  },
}
