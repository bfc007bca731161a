import type { MiddlewareHandler } from 'hono'
import type { CommandContext } from '../commands'
import type { AppEnv } from '../types'

/** Makes the command collaborators available to handlers as `c.get('commands')`. */
export function servicesMiddleware(commands: CommandContext): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('commands', commands)
    await next()
  }
}
