import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { actionId } from '../../audit/logger'
import type { HubContext } from '../context'
import type { SessionInfo } from '../session'
import { DriverError, HubError, errorMessage } from '../errors'
import { parseBody } from '../validate'

const createSchema = z.object({
  instance_id: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, "_", "." and "-"')
    .optional(),
  headless: z.boolean().optional(),
})

/** Wrap anything that is not already a HubError as a driver failure. */
function asDriverError(action: string, err: unknown): HubError {
  return err instanceof HubError ? err : new DriverError(action, errorMessage(err), { cause: err })
}

export function registerAutomationRoutes(server: FastifyInstance, ctx: HubContext): void {
  const { registry, config, audit } = ctx

  // POST /api/automation/create: launch a browser and register it
  server.post('/api/automation/create', async (req, reply) => {
    const body = parseBody(createSchema, req.body)
    const headless = body.headless ?? config.defaultHeadless

    let info: SessionInfo
    try {
      info = await registry.create({ id: body.instance_id, headless })
    } catch (err) {
      audit?.write({
        instance_id: body.instance_id,
        action_id: actionId(),
        type: 'session',
        action: 'create',
        status: 'error',
        params: { headless },
        error: errorMessage(err),
      })
      throw asDriverError('create', err)
    }

    audit?.write({
      instance_id: info.id,
      action_id: actionId(),
      type: 'session',
      action: 'create',
      status: 'ok',
      params: { headless },
    })
    req.log.info({ instance_id: info.id, headless }, 'automation instance created')

    reply.code(201)
    return {
      success: true,
      instance_id: info.id,
      headless: info.headless,
      created_at: info.createdAt,
      message: `Automation instance ${info.id} created successfully`,
    }
  })

  // GET /api/automation/instances
  server.get('/api/automation/instances', async () => {
    return {
      instances: registry.list().map((s) => ({
        instance_id: s.id,
        headless: s.headless,
        created_at: s.createdAt,
      })),
    }
  })

  // DELETE /api/automation/close/:id
  server.delete<{ Params: { id: string } }>('/api/automation/close/:id', async (req) => {
    const { id } = req.params
    try {
      await registry.close(id)
    } catch (err) {
      if (!(err instanceof HubError)) {
        audit?.write({ instance_id: id, action_id: actionId(), type: 'session', action: 'close', status: 'error', error: errorMessage(err) })
      }
      throw asDriverError('close', err)
    }
    audit?.write({ instance_id: id, action_id: actionId(), type: 'session', action: 'close', status: 'ok' })
    req.log.info({ instance_id: id }, 'automation instance closed')
    return { success: true, message: `Instance ${id} closed successfully` }
  })
}
