import { HealthCheckResponseSchema } from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns 200 while the homework poller is running. Used by Docker HEALTHCHECK and orchestrators.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const poller = fastify.homeworkPoller.getStatus().state
      const isHealthy = poller === 'running'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: { poller },
      })
    },
  )
}

export default plugin
