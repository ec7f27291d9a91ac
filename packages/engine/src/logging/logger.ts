export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value)
}

/**
 * One observable event: which component did what, why, and with which data.
 */
export interface LogEvent {
  level: LogLevel
  component: string
  operation: string
  reason: string
  data: string
}

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
}

export function formatLogEvent(event: LogEvent): string {
  const line = `[${LEVEL_LABEL[event.level]}][${event.component}][${event.operation}] <${event.reason}>`
  return event.data ? `${line} ${event.data}` : line
}

/**
 * Writes `[LEVEL][component][operation] <reason> data` lines to a Logger.
 */
export class ComponentLogger {
  constructor(
    readonly component: string,
    private readonly base: Logger = basicLogger(),
  ) {}

  debug(operation: string, reason: string, data = ''): void {
    this.write('debug', operation, reason, data)
  }

  info(operation: string, reason: string, data = ''): void {
    this.write('info', operation, reason, data)
  }

  warn(operation: string, reason: string, data = ''): void {
    this.write('warn', operation, reason, data)
  }

  error(operation: string, reason: string, data = ''): void {
    this.write('error', operation, reason, data)
  }

  private write(level: LogLevel, operation: string, reason: string, data: string): void {
    const line = formatLogEvent({ level, component: this.component, operation, reason, data })
    this.base[level](line)
  }
}

export interface LogEntry {
  id?: number
  timestamp: number
  level: LogLevel
  message: string
  args: unknown[]
}

type LogListener = (entry: LogEntry) => void

export class LogStore {
  private logs: LogEntry[] = []
  private maxLogs: number
  private nextId: number = 0
  private listeners: Set<LogListener> = new Set()

  constructor(maxLogs: number = 1000) {
    this.maxLogs = maxLogs
  }

  add(level: LogLevel, message: string, args: unknown[]): void {
    const entry: LogEntry = {
      id: this.nextId++,
      timestamp: Date.now(),
      level,
      message,
      args,
    }
    this.logs.push(entry)

    if (this.logs.length > this.maxLogs * 1.5) {
      this.logs = this.logs.slice(-this.maxLogs)
    }

    for (const listener of this.listeners) {
      try {
        listener(entry)
      } catch (e) {
        console.error('Log listener error:', e)
      }
    }
  }

  getEntries(): LogEntry[] {
    return this.logs
  }

  /** Messages only, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.logs.filter((entry) => !level || entry.level === level).map((entry) => entry.message)
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  get size(): number {
    return this.logs.length
  }
}

export function basicLogger(): Logger {
  return console
}

/** A Logger that records into a LogStore instead of printing. */
export function storeLogger(store: LogStore): Logger {
  return {
    debug: (msg, ...args) => store.add('debug', msg, args),
    info: (msg, ...args) => store.add('info', msg, args),
    warn: (msg, ...args) => store.add('warn', msg, args),
    error: (msg, ...args) => store.add('error', msg, args),
  }
}

export function filteredLogger(level: LogLevel, base: Logger = basicLogger()): Logger {
  const minPriority = LEVEL_PRIORITY[level]
  const noop = () => {}
  return {
    debug: minPriority <= 0 ? base.debug.bind(base) : noop,
    info: minPriority <= 1 ? base.info.bind(base) : noop,
    warn: minPriority <= 2 ? base.warn.bind(base) : noop,
    error: base.error.bind(base),
  }
}
