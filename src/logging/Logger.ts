import { appendFileSync, mkdirSync } from 'fs'
import path from 'path'
import os from 'os'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogDetails = Record<string, unknown>

export interface Logger {
  debug(event: string, details?: LogDetails): void
  info(event: string, details?: LogDetails): void
  warn(event: string, details?: LogDetails): void
  error(event: string, details?: LogDetails): void
}

export interface LogRecord {
  level: LogLevel
  event: string
  details: LogDetails
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

// Debug records are forced on when BAKSCOPE_DEBUG is set, whatever the configured level
export const isDebugEnv = (env: NodeJS.ProcessEnv = process.env): boolean =>
  env.BAKSCOPE_DEBUG === 'true' || env.BAKSCOPE_DEBUG === '1'

export const DEFAULT_LOG_PATH = path.join(os.homedir(), '.bakscope', 'bakscope.log')

abstract class LevelLogger implements Logger {
  constructor(private minLevel: LogLevel) {}

  protected abstract write(record: LogRecord): void

  private log(level: LogLevel, event: string, details: LogDetails = {}): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return
    this.write({ level, event, details })
  }

  debug(event: string, details?: LogDetails): void {
    this.log('debug', event, details)
  }

  info(event: string, details?: LogDetails): void {
    this.log('info', event, details)
  }

  warn(event: string, details?: LogDetails): void {
    this.log('warn', event, details)
  }

  error(event: string, details?: LogDetails): void {
    this.log('error', event, details)
  }
}

/**
 * Appends one JSON line per record to a log file:
 * `2024-01-02T10:00:00.000Z - {"level":"info","event":"versions_loaded",...}`
 */
export class FileLogger extends LevelLogger {
  private dirReady = false

  constructor(
    private logPath: string = DEFAULT_LOG_PATH,
    minLevel: LogLevel = isDebugEnv() ? 'debug' : 'info'
  ) {
    super(minLevel)
  }

  protected write(record: LogRecord): void {
    if (!this.dirReady) {
      mkdirSync(path.dirname(this.logPath), { recursive: true })
      this.dirReady = true
    }
    const line = JSON.stringify({ level: record.level, event: record.event, ...record.details })
    appendFileSync(this.logPath, `${new Date().toISOString()} - ${line}\n`)
  }
}

export class ConsoleLogger extends LevelLogger {
  constructor(minLevel: LogLevel = 'warn') {
    super(minLevel)
  }

  protected write(record: LogRecord): void {
    const suffix = Object.keys(record.details).length > 0 ? ` ${JSON.stringify(record.details)}` : ''
    console.error(`bakscope: ${record.level.toUpperCase()}: ${record.event}${suffix}`)
  }
}

export class MemoryLogger extends LevelLogger {
  readonly records: LogRecord[] = []

  constructor(minLevel: LogLevel = 'debug') {
    super(minLevel)
  }

  protected write(record: LogRecord): void {
    this.records.push(record)
  }

  events(level?: LogLevel): string[] {
    return this.records
      .filter(record => level === undefined || record.level === level)
      .map(record => record.event)
  }
}

/**
 * Fans records out to several sinks, e.g. the log file and the terminal.
 */
export class CompositeLogger implements Logger {
  constructor(private loggers: Logger[]) {}

  debug(event: string, details?: LogDetails): void {
    this.loggers.forEach(logger => logger.debug(event, details))
  }

  info(event: string, details?: LogDetails): void {
    this.loggers.forEach(logger => logger.info(event, details))
  }

  warn(event: string, details?: LogDetails): void {
    this.loggers.forEach(logger => logger.warn(event, details))
  }

  error(event: string, details?: LogDetails): void {
    this.loggers.forEach(logger => logger.error(event, details))
  }
}
