import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  properties: {
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    // Credentials default to blank so their absence can be reported by name
    practicumToken: {
      type: 'string',
      default: '',
    },
    practicumEndpoint: {
      type: 'string',
      default: 'https://practicum.yandex.ru/api/user_api/homework_statuses/',
    },
    telegramToken: {
      type: 'string',
      default: '',
    },
    telegramChatId: {
      type: 'string',
      default: '',
    },
    telegramApiUrl: {
      type: 'string',
      default: 'https://api.telegram.org',
    },
    pollerEnabled: {
      type: 'boolean',
      default: true,
    },
    retryPeriodSeconds: {
      type: 'number',
      minimum: 1,
      default: 600,
    },
    requestTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 10000,
    },
  },
}

/**
 * Loads the configuration once from the environment and `.env`.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    // Applied before other plugins create their child loggers
    fastify.log.level = fastify.config.logLevel
  },
  {
    name: 'config',
  },
)
