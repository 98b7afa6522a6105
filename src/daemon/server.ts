import Fastify from 'fastify'
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { HubContext } from './context'
import { HubError } from './errors'
import { registerAutomationRoutes } from './routes/automation'
import { registerActionRoutes } from './routes/actions'
import { registerTestRoutes } from './routes/tests'
import { registerResultRoutes } from './routes/results'

export const VERSION = '0.1.0'

function loggerOptions(level: string) {
  if (level === 'silent') return false
  return {
    level,
    ...(process.stdout.isTTY
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
          },
        }
      : {}),
  }
}

function providedToken(req: FastifyRequest): string | undefined {
  const xToken = req.headers['x-api-token']
  if (typeof xToken === 'string') return xToken
  const authHeader = req.headers['authorization']
  return authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined
}

export function buildServer(ctx: HubContext): FastifyInstance {
  const { config, registry } = ctx
  const server = Fastify({ logger: loggerOptions(config.logLevel) })

  // API token authentication (only enforced when RPAHUB_API_TOKEN is set)
  if (config.apiToken) {
    server.addHook('preHandler', async (req: FastifyRequest, reply: FastifyReply) => {
      if (req.routeOptions.url === '/health') return
      if (providedToken(req) !== config.apiToken) {
        return reply.code(401).send({
          success: false,
          error: 'unauthorized',
          message: 'Provide X-API-Token or Authorization: Bearer <token>',
        })
      }
    })
  }

  server.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof HubError) {
      if (err.statusCode >= 500) req.log.warn({ err }, err.message)
      return reply.code(err.statusCode).send(err.toBody())
    }
    const status = err.statusCode ?? 500
    if (status < 500) {
      return reply.code(status).send({ success: false, error: 'bad_request', message: err.message })
    }
    req.log.error({ err }, 'unhandled error')
    return reply.code(500).send({ success: false, error: 'internal_error', message: err.message })
  })

  server.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({ success: false, error: 'not_found', message: `Endpoint not found: ${req.method} ${req.url}` })
  })

  // Health check, exempt from token auth
  server.get('/health', async () => {
    return {
      status: 'ok',
      version: VERSION,
      uptime_s: Math.floor(process.uptime()),
      sessions_active: registry.count(),
    }
  })

  registerAutomationRoutes(server, ctx)
  registerActionRoutes(server, ctx)
  registerTestRoutes(server, ctx)
  registerResultRoutes(server, ctx)

  return server
}
