import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger as requestLogger } from 'hono/logger'
import type { CommandContext } from './commands'
import type { AppEnv } from './types'
import { servicesMiddleware } from './middleware/services'
import { errorHandler } from './middleware/error-handler'
import { salesHandler } from './handlers/sales'

/** Builds the HTTP application around a set of command collaborators. */
export function createApp(commands: CommandContext): Hono<AppEnv> {
  const app = new Hono<AppEnv>()
  const httpLog = commands.logger.child({ module: 'http' })

  // -------------------------------------------------------------------------
  // Global middleware (applies to all routes including /health)
  // -------------------------------------------------------------------------
  app.use('*', requestLogger((line) => httpLog.info(line)))
  app.use('*', cors())

  // -------------------------------------------------------------------------
  // Public routes
  // -------------------------------------------------------------------------
  app.get('/health', (c) => {
    return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
  })

  // -------------------------------------------------------------------------
  // Versioned API
  // -------------------------------------------------------------------------
  const v1 = new Hono<AppEnv>()
  v1.use('*', servicesMiddleware(commands))
  v1.route('/sales', salesHandler)

  app.route('/api/v1', v1)

  // -------------------------------------------------------------------------
  // Errors and 404 fallback
  // -------------------------------------------------------------------------
  app.onError(errorHandler(commands.logger))
  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

  return app
}
