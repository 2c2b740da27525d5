/**
 * Structured console logging for store and vector events.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  event: string
  message?: string
  details?: Record<string, unknown>
}

export type LogSink = (level: LogLevel, line: string) => void

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.log(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
      console.error(line)
      break
  }
}

export class Logger {
  #enabled = true
  #sink: LogSink = consoleSink

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return
    if (level === 'debug' && !process.env.KVVEC_DEBUG) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data
    }

    const parts = [
      `[${entry.timestamp}] [${level.toUpperCase()}] [${entry.event}]`
    ]

    if (entry.message) {
      parts.push(entry.message)
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details, stringifyBigInt))
    }

    this.#sink(level, parts.join(' '))
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log('debug', event, data)
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log('info', event, data)
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log('warn', event, data)
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log('error', event, data)
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled
  }

  /**
   * Route output somewhere other than the console. Pass nothing to restore it.
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink
  }
}

// Versions and indices are bigints
function stringifyBigInt(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

/**
 * Global logger instance
 */
export const logger = new Logger()
