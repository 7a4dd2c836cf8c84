import type { LogLevel, Logger } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

export interface LoggerOptions {
  /** Minimum level written; lower levels are dropped. */
  level?: LogLevel
  /** Stamped on every line as `scope`. */
  scope?: string
  /** Line sink, stdout by default. */
  write?: (line: string) => void
}

function defaultWrite(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line)
}

/** Creates a JSON-lines logger filtered at `level`. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const min = LEVEL_ORDER[options.level ?? 'info']
  const write = options.write ?? defaultWrite

  const emit = (level: LogLevel, event: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < min) return
    const payload = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      ...(options.scope ? { scope: options.scope } : {}),
      event,
      ...(data ?? {})
    }
    write(JSON.stringify(payload))
  }

  return {
    debug: (event, data) => emit('debug', event, data),
    info: (event, data) => emit('info', event, data),
    warn: (event, data) => emit('warn', event, data),
    error: (event, data) => emit('error', event, data)
  }
}

/** Process-wide default logger at INFO. */
export const logger: Logger = createLogger()
