import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns whether the notification queues are initialized and the queue driver is running, along with the queue lengths.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const queues = fastify.notificationQueue
      const queuesReady = queues.initialized
      const driverRunning = fastify.queueDriver.isRunning

      const isHealthy = queuesReady && driverRunning
      const body: HealthCheckResponse = {
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          queues: queuesReady ? 'ok' : 'failed',
          driver: driverRunning ? 'running' : 'stopped',
        },
        queues: queuesReady ? queues.lengths() : null,
      }

      return reply.status(isHealthy ? 200 : 503).send(body)
    },
  )
}

export default plugin
