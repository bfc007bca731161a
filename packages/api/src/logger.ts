// ---------------------------------------------------------------------------
// Logging
//
// One pino root logger per process; modules take child loggers so every line
// carries a `module` field.
// ---------------------------------------------------------------------------

import { pino, type Logger } from 'pino'
import type { LogLevel } from './config'

export type { Logger }

export interface LoggerOptions {
  readonly level: LogLevel
  readonly name?: string
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name ?? 'sale-records',
    level: options.level,
  })
}

/** A logger that discards everything. Used by tests and tooling. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
