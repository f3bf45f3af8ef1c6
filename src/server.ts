import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import { createLoggerConfig } from '@utils/logger.js'
import serviceApp, { options } from './app.js'

/**
 * Initializes and starts the notification daemon with configured plugins,
 * logging and graceful shutdown handling.
 *
 * Persistent connections (close signal streams) are forcibly closed during
 * shutdown. Startup errors are logged and terminate the process.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    ...options,
    pluginTimeout: 60000,
    // Force close persistent connections (like SSE) during shutdown
    forceCloseConnections: true,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: app.config.host,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void init()
