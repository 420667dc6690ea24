import type { LogLevel, Logger } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload))
}

/** JSON-lines logger that drops events below `minLevel`. */
export function createLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]
  return {
    debug(event, data) {
      if (enabled('debug')) emit('debug', event, data)
    },
    info(event, data) {
      if (enabled('info')) emit('info', event, data)
    },
    warn(event, data) {
      if (enabled('warn')) emit('warn', event, data)
    },
    error(event, data) {
      if (enabled('error')) emit('error', event, data)
    }
  }
}

/** Default logger used when callers do not inject one. */
export const logger: Logger = createLogger()

/** Formats any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
