/**
 * Console logging with [Tag] prefixes.
 *
 * The threshold is global: 0 shows warnings and errors, 1 adds info, 2 adds debug.
 * COLORWEAVE_DEBUG seeds it so library users get the same switch as the CLI's -D flag.
 */

export type LogLevel = 0 | 1 | 2

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export const LOG_LEVEL_NAMES = ['WARNING', 'INFO', 'DEBUG'] as const

let threshold: LogLevel = parseLogLevel(process.env.COLORWEAVE_DEBUG)

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = Number(value)
  if (level === 1 || level === 2) return level
  return 0
}

export function configureLogging(level: LogLevel) {
  threshold = level
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  return {
    debug: (...args) => {
      if (threshold >= 2) console.debug(prefix, ...args)
    },
    info: (...args) => {
      if (threshold >= 1) console.info(prefix, ...args)
    },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  }
}
