import { randomUUID } from 'node:crypto'
import { on } from 'node:events'
import { ClosedSignalSchema } from '@schemas/notifications/notification.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const closedStreamRoute: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/closed',
    {
      schema: {
        summary: 'Stream close signals',
        operationId: 'streamClosedNotifications',
        description:
          'Server-Sent Events stream carrying a NotificationClosed signal (id, reason, freedesktop reason code and the closed notification) every time a notification leaves the screen or the waiting queue.',
        tags: ['Notifications'],
      },
    },
    async (request, reply) => {
      const connectionId = randomUUID()
      const abortController = new AbortController()

      fastify.log.debug({ connectionId }, 'Close signal stream opened')

      request.socket.on('close', () => {
        fastify.log.debug({ connectionId }, 'Close signal stream closed')
        abortController.abort()
      })

      return reply.sse(
        (async function* source() {
          try {
            for await (const [signal] of on(
              fastify.notificationQueue.getEventEmitter(),
              'closed',
              { signal: abortController.signal },
            )) {
              const parsed = ClosedSignalSchema.parse(signal)
              yield {
                id: String(parsed.id),
                event: 'closed',
                data: JSON.stringify(parsed),
              }
            }
          } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
              return
            }
            logRouteError(fastify.log, request, error, {
              message: 'SSE stream error',
              connectionId,
            })
          }
        })(),
      )
    },
  )
}

export default closedStreamRoute
