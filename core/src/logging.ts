/**
 * @file src/logging.ts
 * @description
 * Console logging for the ledger packages. Each line carries an ISO
 * timestamp, the seconds elapsed since the previous line and the name of
 * the file that logged it.
 */

import { inspect } from 'node:util'
import defaultLoggingConfig from './logging.config.js'

let lastLogTime = performance.now()

let loggingConfig: { [file: string]: boolean } = { ...defaultLoggingConfig }

/**
 * Enable or disable logging per file; `default` covers unlisted files.
 */
export const configureLogging = (overrides: { [file: string]: boolean }): void => {
  loggingConfig = { ...loggingConfig, ...overrides }
}

export const log = {
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
}

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'object' && val !== null) {
    return inspect(val, { depth: 4, breakLength: 120 })
  }
  return val
}

export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  const enabled = loggingConfig[file] !== undefined ? loggingConfig[file] : loggingConfig.default
  if (!enabled) return

  const now = performance.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()

  console.log(
    `[${timestamp}] [${elapsed.toFixed(3)}s] [${file}]`,
    safeFormat(message),
    ...args.map(safeFormat)
  )
}
