import { pollerStatusSchema } from '@schemas/poller/poller-status.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

export const getStatusRoute: FastifyPluginAsyncZod = async (fastify) => {
  fastify.route({
    method: 'GET',
    url: '/status',
    schema: pollerStatusSchema,
    handler: async () => fastify.homeworkPoller.getStatus(),
  })
}
