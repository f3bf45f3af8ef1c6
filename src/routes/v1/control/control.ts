import {
  DesktopStateResponseSchema,
  DesktopStateUpdateSchema,
  DisplayLimitSchema,
  PauseStatusSchema,
} from '@schemas/control/control.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/pause',
    {
      schema: {
        summary: 'Get pause state',
        operationId: 'getPauseStatus',
        description: 'Whether notification display is paused.',
        response: {
          200: PauseStatusSchema,
        },
        tags: ['Control'],
      },
    },
    async () => ({ paused: fastify.notificationQueue.pauseStatus() }),
  )

  fastify.put(
    '/pause',
    {
      schema: {
        summary: 'Set pause state',
        operationId: 'setPauseStatus',
        description:
          'Pause or resume notification display. While paused nothing is promoted or expired; new notifications still queue up.',
        body: PauseStatusSchema,
        response: {
          200: PauseStatusSchema,
        },
        tags: ['Control'],
      },
    },
    async (request) => {
      const queues = fastify.notificationQueue
      if (request.body.paused) {
        queues.pauseOn()
      } else {
        queues.pauseOff()
      }
      return { paused: queues.pauseStatus() }
    },
  )

  fastify.put(
    '/display-limit',
    {
      schema: {
        summary: 'Set display limit',
        operationId: 'setDisplayLimit',
        description:
          'Maximum number of notifications on screen, 0 for unlimited. Takes effect on the next queue pass, which moves the most recently shown notifications back to waiting when the new limit is lower.',
        body: DisplayLimitSchema,
        response: {
          200: DisplayLimitSchema,
        },
        tags: ['Control'],
      },
    },
    async (request) => {
      const queues = fastify.notificationQueue
      queues.setDisplayLimit(request.body.limit)
      return { limit: queues.getDisplayLimit() }
    },
  )

  fastify.get(
    '/desktop',
    {
      schema: {
        summary: 'Get desktop state',
        operationId: 'getDesktopState',
        description:
          'Idle and fullscreen state last reported by the renderer, and the delay until the next queue pass.',
        response: {
          200: DesktopStateResponseSchema,
        },
        tags: ['Control'],
      },
    },
    async () => ({
      ...fastify.queueDriver.desktopState,
      nextWakeUp: fastify.queueDriver.nextDelay,
    }),
  )

  fastify.put(
    '/desktop',
    {
      schema: {
        summary: 'Report desktop state',
        operationId: 'setDesktopState',
        description:
          'Report whether the user is idle and whether a fullscreen window is up. Runs a queue pass when the state changes.',
        body: DesktopStateUpdateSchema,
        response: {
          200: DesktopStateResponseSchema,
        },
        tags: ['Control'],
      },
    },
    async (request) => {
      const driver = fastify.queueDriver
      const state = driver.setDesktopState(request.body)
      return { ...state, nextWakeUp: driver.nextDelay }
    },
  )
}

export default plugin
