// ---------------------------------------------------------------------------
// Lambda entry point
//
// Wraps the Hono app with the AWS Lambda adapter. The container is built on
// the first invocation of a cold start and reused while the instance is warm.
//
// Environment variables are documented in config.ts.
// ---------------------------------------------------------------------------

import { handle, type LambdaContext, type LambdaEvent } from 'hono/aws-lambda'
import { loadConfig } from './config'
import { createContainer } from './container'

let lambda: Promise<ReturnType<typeof handle>> | undefined

export async function handler(event: LambdaEvent, context?: LambdaContext) {
  if (!lambda) {
    lambda = createContainer(loadConfig())
      .then(({ app }) => handle(app))
      .catch((err: unknown) => {
        // retry the cold start on the next invocation
        lambda = undefined
        throw err
      })
  }
  return (await lambda)(event, context)
}
