import { NotificationQueueService } from '@services/notification-queue.service.js'
import { parseQueuePolicy } from '@utils/queue-policy.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    notificationQueue: NotificationQueueService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const policy = parseQueuePolicy(fastify.config, fastify.log)
    const service = new NotificationQueueService(fastify.log, policy)

    service.init()
    fastify.decorate('notificationQueue', service)

    fastify.log.debug(
      {
        displayLimit: policy.displayLimit,
        historyLength: policy.historyLength,
        stackDuplicates: policy.stackDuplicates,
        duplicateFields: policy.duplicateFields,
      },
      'Notification queues ready',
    )

    fastify.addHook('onClose', async () => {
      service.teardown()
    })
  },
  {
    name: 'notification-queue',
    dependencies: ['config'],
  },
)
