// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { CommandContext } from './commands'

/**
 * Variables injected into Hono context by the services middleware.
 * Every handler mounted under /api/v1 can rely on `commands` being present.
 */
export type AppVariables = {
  /** Repository, notifier and logger shared by the command handlers. */
  commands: CommandContext
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }
