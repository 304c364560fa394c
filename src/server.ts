import serviceApp from '@root/app.js'
import { MissingCredentialsError } from '@utils/credentials.js'
import { createLoggerConfig } from '@utils/logger.js'
import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'

/**
 * Starts the poller behind a small Fastify server and wires graceful
 * shutdown. Exits with status 1 when required credentials are missing.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  try {
    await app.register(fp(serviceApp))
    await app.ready()
  } catch (err) {
    if (err instanceof MissingCredentialsError) {
      app.log.fatal(
        { missing: err.missing },
        'Required credentials are missing, the poller will not start',
      )
    } else {
      app.log.fatal({ error: err }, 'Failed to initialize application')
    }
    process.exit(1)
  }

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error({ error: err }, 'Shutting down after error')
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '0.0.0.0',
    })
  } catch (err) {
    app.log.error({ error: err }, 'Failed to start server')
    process.exit(1)
  }
}

init().catch((err) => {
  console.error('Failed to start:', err)
  process.exit(1)
})
