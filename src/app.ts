import envPlugin from '@plugins/external/env.js'
import errorHandler from '@plugins/custom/error-handler.js'
import homeworkPoller from '@plugins/custom/homework-poller.js'
import notFoundHandler from '@plugins/custom/not-found.js'
import scheduler from '@plugins/custom/scheduler.js'
import telegramNotifications from '@plugins/custom/telegram-notifications.js'
import healthRoute from '@root/routes/health.js'
import pollerRoutes from '@root/routes/v1/poller/index.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

/**
 * Registers configuration, the poller and its collaborators, and the HTTP
 * routes exposing the poller's state.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions,
) {
  // Set up Zod validators
  fastify.setValidatorCompiler(validatorCompiler)
  fastify.setSerializerCompiler(serializerCompiler)

  await fastify.register(envPlugin)
  await fastify.register(errorHandler)
  await fastify.register(notFoundHandler)

  await fastify.register(scheduler)
  await fastify.register(telegramNotifications)
  await fastify.register(homeworkPoller)

  await fastify.register(healthRoute)
  await fastify.register(pollerRoutes, { prefix: '/v1/poller' })
}
