/**
 * Homework Poller Plugin
 *
 * Verifies credentials, then registers the poller and starts it once the
 * server is ready.
 */

import { HomeworkApiClient } from '@services/homework-poller/api-client.js'
import { HomeworkPollerService } from '@services/homework-poller.service.js'
import {
  findMissingCredentials,
  MissingCredentialsError,
} from '@utils/credentials.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    homeworkPoller: HomeworkPollerService
  }
}

export default fp(
  async function homeworkPoller(fastify: FastifyInstance) {
    const { config } = fastify

    const missing = findMissingCredentials(config)
    if (missing.length > 0) {
      for (const key of missing) {
        fastify.log.fatal(`Missing required environment variable ${key}`)
      }
      throw new MissingCredentialsError(missing)
    }

    const service = new HomeworkPollerService(
      createServiceLogger(fastify.log, 'poller'),
      fastify.scheduler,
      {
        source: new HomeworkApiClient({
          endpoint: config.practicumEndpoint,
          token: config.practicumToken,
          timeoutMs: config.requestTimeoutMs,
        }),
        notifier: fastify.telegram,
        chatId: config.telegramChatId,
        retryPeriodSeconds: config.retryPeriodSeconds,
      },
    )
    fastify.decorate('homeworkPoller', service)

    fastify.addHook('onReady', async () => {
      if (!config.pollerEnabled) {
        fastify.log.info('Homework poller is disabled, not starting')
        return
      }
      if (!service.start()) {
        fastify.log.error('Failed to schedule homework poller')
      }
    })

    fastify.addHook('onClose', async () => {
      service.stop()
    })
  },
  {
    name: 'homework-poller',
    dependencies: ['config', 'scheduler', 'telegram-notification-service'],
  },
)
