// ---------------------------------------------------------------------------
// Composition root
//
// Wires configuration, logging, the database and the command collaborators
// into one HTTP application. Called once per process (or Lambda cold start).
// ---------------------------------------------------------------------------

import type { Hono } from 'hono'
import type { Sequelize } from 'sequelize'
import {
  SALE_NUMBER_MIN,
  createSequentialSaleNumberGenerator,
  type SaleNumberGenerator,
} from '@sale-records/domain'
import { createApp } from './app'
import type { CommandContext } from './commands'
import type { AppConfig } from './config'
import { createDatabase, syncSchema } from './db'
import { defineSaleModels } from './lib/sale-models'
import { createLogger, type Logger } from './logger'
import { createLogNotifier } from './notifications'
import { createSaleRepository, type SequelizeSaleRepository } from './repositories'
import type { AppEnv } from './types'

export interface Container {
  readonly config: AppConfig
  readonly logger: Logger
  readonly sequelize: Sequelize
  readonly commands: CommandContext
  readonly app: Hono<AppEnv>
}

/**
 * The sequential strategy continues after the highest stored number; the
 * random strategy relies on the unique index and the create retry.
 */
async function saleNumberGenerator(
  config: AppConfig,
  repository: SequelizeSaleRepository,
): Promise<SaleNumberGenerator | undefined> {
  if (config.saleNumberStrategy !== 'sequential') return undefined
  const last = await repository.maxSaleNumber()
  return createSequentialSaleNumberGenerator(last === null ? SALE_NUMBER_MIN : last + 1)
}

export async function createContainer(config: AppConfig): Promise<Container> {
  const logger = createLogger({ level: config.logLevel })
  const dbLogger = logger.child({ module: 'db' })
  const sequelize = createDatabase(config, dbLogger)
  const models = defineSaleModels(sequelize)
  if (config.database.sync) await syncSchema(sequelize, dbLogger)
  const repository = createSaleRepository(sequelize, { models })
  const generateSaleNumber = await saleNumberGenerator(config, repository)

  const commands: CommandContext = {
    repository,
    notifier: createLogNotifier(logger),
    logger: logger.child({ module: 'commands' }),
    ...(generateSaleNumber ? { generateSaleNumber } : {}),
  }

  logger.info({ env: config.env, saleNumberStrategy: config.saleNumberStrategy }, 'container ready')
  return { config, logger, sequelize, commands, app: createApp(commands) }
}
