import { Sequelize } from 'sequelize'
import type { AppConfig } from './config'
import type { Logger } from './logger'

// ---------------------------------------------------------------------------
// Sequelize instance
//
// One instance (and therefore one connection pool) per process. Lambda
// reuses it across warm invocations; nothing connects until the first query.
// ---------------------------------------------------------------------------

export function createDatabase(config: AppConfig, log: Logger): Sequelize {
  return new Sequelize(config.database.url, {
    dialect: 'postgres',
    pool: { max: config.database.poolMax },
    logging: config.database.logging ? (sql) => log.debug({ sql }, 'sql') : false,
  })
}

/**
 * Creates the tables, foreign keys and indexes of every model defined on
 * `sequelize` that do not exist yet. Existing tables are never altered.
 */
export async function syncSchema(sequelize: Sequelize, log: Logger): Promise<void> {
  await sequelize.sync()
  log.info({ models: Object.keys(sequelize.models) }, 'schema synced')
}
