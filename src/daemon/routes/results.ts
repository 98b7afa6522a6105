import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { EXPORT_FORMATS, isExportFormat, renderExport, writeExport } from '../../results/export'
import { resultsDir } from '../config'
import type { HubContext } from '../context'
import { UnsupportedFormatError } from '../errors'
import { parseBody } from '../validate'

const auditQuery = z.object({
  instance_id: z.string().min(1).optional(),
  lines: z.coerce.number().int().min(1).max(1000).default(50),
})

export function registerResultRoutes(server: FastifyInstance, ctx: HubContext): void {
  const { registry, results, runner, audit, config } = ctx

  // GET /api/status: polled by the dashboard
  server.get('/api/status', async () => {
    return {
      is_running: runner.isRunning,
      test_suite: runner.currentSuite,
      active_instances: registry.count(),
      total_results: results.count(),
      timestamp: new Date().toISOString(),
    }
  })

  // GET /api/stats
  server.get('/api/stats', async () => {
    return {
      ...results.stats(),
      active_instances: registry.count(),
      is_running: runner.isRunning,
    }
  })

  // GET /api/results
  server.get('/api/results', async () => {
    const list = results.list()
    return { results: list, total: list.length }
  })

  // GET /api/results/export/:format: download, also written under <dataDir>/results
  server.get<{ Params: { format: string } }>('/api/results/export/:format', async (req, reply) => {
    const { format } = req.params
    if (!isExportFormat(format)) throw new UnsupportedFormatError(format, EXPORT_FORMATS)

    const rendered = renderExport(format, results.list())
    const file = await writeExport(resultsDir(config), rendered)
    req.log.info({ file }, 'results exported')

    return reply
      .header('content-disposition', `attachment; filename="${rendered.filename}"`)
      .type(rendered.contentType)
      .send(rendered.body)
  })

  // GET /api/audit?instance_id=&lines=
  server.get('/api/audit', async (req) => {
    const query = parseBody(auditQuery, req.query)
    return { entries: audit ? audit.tail(query.lines, query.instance_id) : [] }
  })
}
