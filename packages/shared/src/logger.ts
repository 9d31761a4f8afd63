/**
 * Namespaced logger writing `[namespace]`-prefixed lines to a sink
 */

import { createWriteStream, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { format } from 'node:util'
import type { LogLevel, Logger } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export interface LogSink {
  write(level: LogLevel, line: string): void
  close?(): Promise<void>
}

export const consoleSink: LogSink = {
  write(level, line) {
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
}

/**
 * Appends log lines to a file. The TUI owns stdout, so it logs here.
 *
 * If the file cannot be opened or written, `onError` is called once and
 * later lines are dropped.
 */
export function fileSink(path: string, onError?: (error: Error) => void): LogSink {
  let failed = false
  const fail = (error: Error) => {
    if (failed) return
    failed = true
    onError?.(error)
  }

  try {
    mkdirSync(dirname(path), { recursive: true })
  } catch (error) {
    fail(error instanceof Error ? error : new Error(String(error)))
  }
  const stream = createWriteStream(path, { flags: 'a', mode: 0o600 })
  stream.on('error', fail)

  return {
    write(_level, line) {
      if (failed) return
      stream.write(line + '\n')
    },
    close() {
      if (failed || stream.destroyed) {
        return Promise.resolve()
      }
      return new Promise((resolve) => stream.end(() => resolve()))
    }
  }
}

export interface LoggerOptions {
  namespace: string
  level?: LogLevel
  sink?: LogSink
  clock?: () => Date
}

class NamespacedLogger implements Logger {
  constructor(
    private readonly namespace: string,
    private readonly state: { level: LogLevel },
    private readonly sink: LogSink,
    private readonly clock: () => Date
  ) {}

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args)
  }

  setLevel(level: LogLevel): void {
    this.state.level = level
  }

  getLevel(): LogLevel {
    return this.state.level
  }

  // Children share the parent's level
  createChild(childNamespace: string): Logger {
    return new NamespacedLogger(`${this.namespace}:${childNamespace}`, this.state, this.sink, this.clock)
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) return
    const text = args.length > 0 ? format(message, ...args) : message
    const line = `${this.clock().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.namespace}] ${text}`
    this.sink.write(level, line)
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new NamespacedLogger(
    options.namespace,
    { level: options.level ?? 'info' },
    options.sink ?? consoleSink,
    options.clock ?? (() => new Date())
  )
}
