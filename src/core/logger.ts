import type { Logger } from './types.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

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
  // stdout carries tool output, so log records go to stderr.
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(payload))
}

/** JSON logger that drops records below `threshold`. */
export function createLogger(threshold: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
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

/** Simple JSON logger used across runtime modules. */
export const logger: Logger = createLogger(
  process.env.PFRUN_LOG_LEVEL === 'debug' ? 'debug' : 'info'
)
