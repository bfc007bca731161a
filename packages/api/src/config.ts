// ---------------------------------------------------------------------------
// Runtime configuration
//
// Environment variables are read once and validated with zod. Every other
// module receives a typed AppConfig instead of touching process.env.
//
//   NODE_ENV              development | test | production (default: development)
//   LOG_LEVEL             pino level (default: info)
//   DATABASE_URL          PostgreSQL connection string (required)
//   DB_POOL_MAX           connection pool size (default: 5)
//   DB_LOGGING            "true" to log every SQL statement (default: false)
//   DB_SYNC               "false" to skip creating missing tables at startup (default: true)
//   SALE_NUMBER_STRATEGY  random | sequential (default: random)
// ---------------------------------------------------------------------------

import { z } from 'zod'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DATABASE_URL: z.string().url(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(5),
  DB_LOGGING: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  DB_SYNC: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
  SALE_NUMBER_STRATEGY: z.enum(['random', 'sequential']).default('random'),
})

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface AppConfig {
  readonly env: 'development' | 'test' | 'production'
  readonly logLevel: LogLevel
  readonly database: {
    readonly url: string
    readonly poolMax: number
    readonly logging: boolean
    readonly sync: boolean
  }
  readonly saleNumberStrategy: 'random' | 'sequential'
}

/** Raised when the environment does not satisfy EnvSchema. */
export class ConfigError extends Error {
  constructor(readonly keys: readonly string[]) {
    super(`Invalid configuration: ${keys.join(', ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Parses and validates configuration from an environment map.
 *
 * @throws {ConfigError} listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const r = EnvSchema.safeParse(env)
  if (!r.success) {
    throw new ConfigError([...new Set(r.error.issues.map((i) => i.path.join('.')))])
  }
  return {
    env: r.data.NODE_ENV,
    logLevel: r.data.LOG_LEVEL,
    database: {
      url: r.data.DATABASE_URL,
      poolMax: r.data.DB_POOL_MAX,
      logging: r.data.DB_LOGGING,
      sync: r.data.DB_SYNC,
    },
    saleNumberStrategy: r.data.SALE_NUMBER_STRATEGY,
  }
}
