// ---------------------------------------------------------------------------
// Sales handler — create, read, update, cancel and delete sales
//
// Bodies are checked against the command schemas before the handler runs;
// the commands validate again. Domain and command errors are thrown and
// mapped to responses by the app-level error handler.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import type { z } from 'zod'
import type { AppEnv } from '../types'
import {
  CancelSaleBody,
  CreateSaleSchema,
  UpdateSaleBody,
  cancelSale,
  createSale,
  deleteSale,
  getSale,
  toFieldErrors,
  updateSale,
} from '../commands'

function jsonBody<S extends z.ZodTypeAny>(schema: S) {
  return validator('json', (value, c): z.output<S> | Response => {
    const r = schema.safeParse(value)
    if (!r.success) {
      const details = toFieldErrors(r.error)
      const error = details.map((d) => `${d.field}: ${d.message}`).join('; ')
      return c.json({ error, code: 'VALIDATION_ERROR', details }, 400)
    }
    return r.data
  })
}

export const salesHandler = new Hono<AppEnv>()

salesHandler.post('/', jsonBody(CreateSaleSchema), async (c) => {
  const data = await createSale(c.get('commands'), c.req.valid('json'))
  return c.json({ data }, 201)
})

salesHandler.get('/:id', async (c) => {
  const data = await getSale(c.get('commands'), { id: c.req.param('id') })
  return c.json({ data })
})

salesHandler.put('/:id', jsonBody(UpdateSaleBody), async (c) => {
  const body = c.req.valid('json')
  const data = await updateSale(c.get('commands'), { ...body, id: c.req.param('id') })
  return c.json({ data })
})

salesHandler.post('/:id/cancel', jsonBody(CancelSaleBody), async (c) => {
  const body = c.req.valid('json')
  const data = await cancelSale(c.get('commands'), { ...body, id: c.req.param('id') })
  return c.json({ data })
})

salesHandler.delete('/:id', async (c) => {
  await deleteSale(c.get('commands'), { id: c.req.param('id') })
  return c.body(null, 204)
})
