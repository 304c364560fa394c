import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import { getStatusRoute } from './get-status.js'

const pollerPlugin: FastifyPluginAsyncZod = async (fastify) => {
  await fastify.register(getStatusRoute)
}

export default pollerPlugin
