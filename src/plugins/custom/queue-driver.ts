import { QueueDriverService } from '@services/queue-driver.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    queueDriver: QueueDriverService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new QueueDriverService(
      fastify.log,
      fastify.notificationQueue,
      { fallbackInterval: fastify.config.driverFallbackInterval },
    )
    fastify.decorate('queueDriver', service)

    fastify.addHook('onReady', async () => {
      service.start()
    })

    fastify.addHook('onClose', async () => {
      service.stop()
    })
  },
  {
    name: 'queue-driver',
    dependencies: ['config', 'notification-queue'],
  },
)
