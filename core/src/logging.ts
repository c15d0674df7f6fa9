/**
 * @file src/logging.ts
 * @description
 * Console logging for checkvault-core.
 * Level and prefix come from logging.config.ts; bigints are printed as decimals.
 */

import loggingConfig from './logging.config.js'
import type { LogLevel } from './logging.config.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

let lastLogTime = Date.now()

const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[loggingConfig.level]

/**
 * Change the active level at runtime.
 */
export const setLogLevel = (level: LogLevel): void => {
  loggingConfig.level = level
}

export const log = {
  debug: (...args: unknown[]) => { if (enabled('debug')) console.debug(loggingConfig.prefix, '[debug]', ...args.map(safeFormat)) },
  info: (...args: unknown[]) => { if (enabled('info')) console.log(loggingConfig.prefix, '[info]', ...args.map(safeFormat)) },
  warn: (...args: unknown[]) => { if (enabled('warn')) console.warn(loggingConfig.prefix, '[warn]', ...args.map(safeFormat)) },
  error: (...args: unknown[]) => { if (enabled('error')) console.error(loggingConfig.prefix, '[error]', ...args.map(safeFormat)) }
}

// Object formatter that copes with bigint fields
const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'bigint') return val.toString()
  if (typeof val === 'object' && val !== null && !(val instanceof Error)) {
    try {
      return JSON.stringify(val, (_key, value: unknown) => typeof value === 'bigint' ? value.toString() : value, 2)
    } catch {
      return '[unserializable object]'
    }
  }
  return val
}

/**
 * Info-level trace line tagged with the source file and the time since the previous trace.
 */
export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  const fileEnabled = loggingConfig.files[file] !== undefined ? loggingConfig.files[file] : loggingConfig.files.default
  if (!fileEnabled || !enabled('info')) return

  const now = Date.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()

  console.log(
    `${loggingConfig.prefix} [${timestamp}] [${elapsed.toFixed(3)}s] [${file}]`,
    safeFormat(message),
    ...args.map(safeFormat)
  )
}
