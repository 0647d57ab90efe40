/**
 * File logger. The terminal is owned by Ink while the client runs, so log
 * lines go to a file instead of stdout.
 */

import * as fs from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

interface LoggerConfig {
  filePath: string | null
  level: LogLevel
}

const config: LoggerConfig = {
  filePath: null,
  level: 'info',
}

export function configureLogger(options: { filePath: string; level: LogLevel; truncate?: boolean }): void {
  config.filePath = options.filePath
  config.level = options.level
  if (options.truncate) {
    try {
      fs.writeFileSync(options.filePath, '')
    } catch (error) {
      process.stderr.write(`Cannot open log file ${options.filePath}: ${String(error)}\n`)
      config.filePath = null
    }
  }
}

export function formatLogLine(level: LogLevel, scope: string, message: string, date: Date = new Date()): string {
  return `[${date.toISOString()}] ${level.toUpperCase().padEnd(5)} ${scope}: ${message}`
}

function write(level: LogLevel, scope: string, message: string): void {
  if (!config.filePath) return
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return
  try {
    fs.appendFileSync(config.filePath, formatLogLine(level, scope, message) + '\n')
  } catch {
    // The log file is the only sink; a failed append has nowhere to go.
    config.filePath = null
  }
}

export interface ScopedLogger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export function createLogger(scope: string): ScopedLogger {
  return {
    debug: (message) => write('debug', scope, message),
    info: (message) => write('info', scope, message),
    warn: (message) => write('warn', scope, message),
    error: (message) => write('error', scope, message),
  }
}
