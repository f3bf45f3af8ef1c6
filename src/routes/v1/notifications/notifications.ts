import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  CloseQuerySchema,
  InsertResponseSchema,
  NotificationIdParamsSchema,
  NotificationInputSchema,
  NotificationListSchema,
  NotificationReplaceBodySchema,
  NotificationSchema,
  QueueCountsSchema,
} from '@schemas/notifications/notification.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  // Submit a notification
  fastify.post(
    '/',
    {
      schema: {
        summary: 'Submit notification',
        operationId: 'insertNotification',
        description:
          'Queue a new notification. A non-zero id replaces the live notification with that id in place. Returns id 0 with dismissed=true when the notification was stacked onto an identical one.',
        body: NotificationInputSchema,
        response: {
          200: InsertResponseSchema,
        },
        tags: ['Notifications'],
      },
    },
    async (request) => {
      const id = fastify.notificationQueue.insert(request.body)
      return { id, dismissed: id === 0 }
    },
  )

  // Replace a live notification
  fastify.put(
    '/:id',
    {
      schema: {
        summary: 'Replace notification',
        operationId: 'replaceNotification',
        description:
          'Replace the notification with the given id, keeping its position in its queue.',
        params: NotificationIdParamsSchema,
        body: NotificationReplaceBodySchema,
        response: {
          200: NotificationSchema,
          404: ErrorSchema,
        },
        tags: ['Notifications'],
      },
    },
    async (request, reply) => {
      const { id } = request.params
      const queues = fastify.notificationQueue

      if (!queues.replaceById({ ...request.body, id })) {
        return reply.notFound(`Notification ${id} not found`)
      }

      const replaced = [
        ...queues.getDisplayed(),
        ...queues.getWaiting(),
        ...queues.getHistory(),
      ].find((notification) => notification.id === id)
      if (!replaced) {
        return reply.notFound(`Notification ${id} not found`)
      }
      return replaced
    },
  )

  // Close a notification
  fastify.delete(
    '/:id',
    {
      schema: {
        summary: 'Close notification',
        operationId: 'closeNotification',
        description:
          'Close the notification with the given id and move it to history. Closing an unknown or already closed notification is not an error.',
        params: NotificationIdParamsSchema,
        querystring: CloseQuerySchema,
        tags: ['Notifications'],
      },
    },
    async (request, reply) => {
      fastify.notificationQueue.closeById(
        request.params.id,
        request.query.reason,
      )
      return reply.code(204).send()
    },
  )

  fastify.get(
    '/displayed',
    {
      schema: {
        summary: 'List displayed notifications',
        operationId: 'getDisplayedNotifications',
        description: 'Notifications currently on screen, in promotion order.',
        response: {
          200: NotificationListSchema,
        },
        tags: ['Notifications'],
      },
    },
    async () => [...fastify.notificationQueue.getDisplayed()],
  )

  fastify.get(
    '/waiting',
    {
      schema: {
        summary: 'List waiting notifications',
        operationId: 'getWaitingNotifications',
        description: 'Notifications accepted but not shown yet.',
        response: {
          200: NotificationListSchema,
        },
        tags: ['Notifications'],
      },
    },
    async () => [...fastify.notificationQueue.getWaiting()],
  )

  fastify.get(
    '/counts',
    {
      schema: {
        summary: 'Queue counts',
        operationId: 'getQueueCounts',
        description:
          'Number of waiting, displayed and archived notifications, with the pause state and display limit.',
        response: {
          200: QueueCountsSchema,
        },
        tags: ['Notifications'],
      },
    },
    async () => {
      const queues = fastify.notificationQueue
      return {
        ...queues.lengths(),
        paused: queues.pauseStatus(),
        displayLimit: queues.getDisplayLimit(),
      }
    },
  )
}

export default plugin
