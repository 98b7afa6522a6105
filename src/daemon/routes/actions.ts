import type { FastifyInstance } from 'fastify'
import { commandSchemas } from '../../dispatch/commands'
import type { HubContext } from '../context'
import { parseBody } from '../validate'

/**
 * One route per dispatchable command. Bodies are validated before the
 * dispatcher sees them; errors propagate to the server's error handler.
 */
export function registerActionRoutes(server: FastifyInstance, ctx: HubContext): void {
  const { dispatcher } = ctx

  // POST /api/navigate
  server.post('/api/navigate', async (req) => {
    const command = parseBody(commandSchemas.navigate, req.body)
    const { payload, record } = await dispatcher.dispatch('navigate', command)
    return { success: true, message: record.description, url: payload.url, title: payload.title }
  })

  // POST /api/search
  server.post('/api/search', async (req) => {
    const command = parseBody(commandSchemas.search, req.body)
    const { payload, record } = await dispatcher.dispatch('search', command)
    return { success: true, message: record.description, url: payload.url, title: payload.title }
  })

  // POST /api/form/fill
  server.post('/api/form/fill', async (req) => {
    const command = parseBody(commandSchemas['fill-form'], req.body)
    const { payload, record } = await dispatcher.dispatch('fill-form', command)
    return {
      success: true,
      message: record.description,
      filled: payload.filled,
      missing: payload.missing,
      submitted: payload.submitted,
    }
  })

  // POST /api/extract
  server.post('/api/extract', async (req) => {
    const command = parseBody(commandSchemas.extract, req.body)
    const { payload, record } = await dispatcher.dispatch('extract', command)
    return { success: true, message: record.description, data: payload.data, missing: payload.missing }
  })

  // POST /api/screenshot
  server.post('/api/screenshot', async (req) => {
    const command = parseBody(commandSchemas.screenshot, req.body)
    const { payload, record } = await dispatcher.dispatch('screenshot', command)
    return { success: true, message: record.description, filename: payload.filename, path: payload.path }
  })

  // POST /api/scrape/table
  server.post('/api/scrape/table', async (req) => {
    const command = parseBody(commandSchemas['scrape-table'], req.body)
    const { payload, record } = await dispatcher.dispatch('scrape-table', command)
    return { success: true, message: record.description, headers: payload.headers, rows: payload.rows }
  })
}
