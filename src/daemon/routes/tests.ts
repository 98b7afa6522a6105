import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { SUITE_NAMES } from '../../suites/types'
import type { HubContext } from '../context'
import { TestsRunningError } from '../errors'
import { parseBody } from '../validate'

const runSchema = z.object({
  test_suite: z.enum(SUITE_NAMES).default('basic'),
})

export function registerTestRoutes(server: FastifyInstance, ctx: HubContext): void {
  const { runner } = ctx

  // POST /api/tests/run: start a suite in the background
  server.post('/api/tests/run', async (req) => {
    const { test_suite } = parseBody(runSchema, req.body)
    if (!runner.start(test_suite)) {
      throw new TestsRunningError(runner.currentSuite ?? test_suite)
    }
    req.log.info({ test_suite }, 'test suite started')
    return { success: true, message: `Started ${test_suite} test suite`, test_suite }
  })

  // POST /api/tests/stop
  server.post('/api/tests/stop', async (req) => {
    const stopped = runner.stop()
    if (stopped) req.log.info('test suite stop requested')
    return { success: true, message: stopped ? 'Tests stopping' : 'No tests running', stopped }
  })
}
