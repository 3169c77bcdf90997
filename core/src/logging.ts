/**
 * @file core/src/logging.ts
 * @description
 * Console logging for gatemint.
 * Each source file logs under its own name and can be switched off on its own.
 */

import { inspect } from 'node:util'

let lastLogTime = performance.now()

// Per-file switches; 'default' covers every file without an entry
let loggingConfig: { [file: string]: boolean } = { default: true }

export const configureLogging = (config: { [file: string]: boolean }): void => {
  loggingConfig = { ...loggingConfig, ...config }
}

const isEnabled = (file: string): boolean =>
  loggingConfig[file] !== undefined ? loggingConfig[file] : loggingConfig.default

export const log = {
  info: (...args: unknown[]) => { if (isEnabled('default')) console.log('[info]', ...args) },
  warn: (...args: unknown[]) => { if (isEnabled('default')) console.warn('[warn]', ...args) },
  error: (...args: unknown[]) => { if (isEnabled('default')) console.error('[error]', ...args) }
}

const format = (val: unknown): unknown =>
  typeof val === 'object' && val !== null ? inspect(val, { depth: 4, breakLength: 120 }) : val

export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  if (!isEnabled(file)) return

  const now = performance.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()

  console.log(
    `[${timestamp}] [${elapsed.toFixed(3)}s] [${file}]`,
    format(message),
    ...args.map(format)
  )
}
