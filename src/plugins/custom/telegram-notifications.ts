import { TelegramService } from '@services/notifications/channels/telegram.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    telegram: TelegramService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.log.debug('Initializing Telegram notification plugin')

    const telegramService = new TelegramService(
      createServiceLogger(fastify.log, 'telegram'),
      fastify.config,
    )
    fastify.decorate('telegram', telegramService)
  },
  {
    name: 'telegram-notification-service',
    dependencies: ['config'],
  },
)
