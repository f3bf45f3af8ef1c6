import {
  HistoryPopResponseSchema,
  HistoryPushAllResponseSchema,
} from '@schemas/history/history.schema.js'
import { NotificationListSchema } from '@schemas/notifications/notification.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'List history',
        operationId: 'getHistory',
        description: 'Archived notifications, most recent first.',
        response: {
          200: NotificationListSchema,
        },
        tags: ['History'],
      },
    },
    async () => [...fastify.notificationQueue.getHistory()],
  )

  fastify.post(
    '/pop',
    {
      schema: {
        summary: 'Restore latest notification',
        operationId: 'popHistory',
        description:
          'Bring the most recently archived notification back on screen, or into the waiting queue when the display limit is reached.',
        response: {
          200: HistoryPopResponseSchema,
        },
        tags: ['History'],
      },
    },
    async () => {
      const id = fastify.notificationQueue.historyPop()
      return { id, restored: id !== null }
    },
  )

  fastify.post(
    '/push-all',
    {
      schema: {
        summary: 'Close all notifications',
        operationId: 'pushAllToHistory',
        description:
          'Close every displayed and waiting notification as dismissed by the user and move them to history.',
        response: {
          200: HistoryPushAllResponseSchema,
        },
        tags: ['History'],
      },
    },
    async () => ({ closed: fastify.notificationQueue.historyPushAll() }),
  )
}

export default plugin
