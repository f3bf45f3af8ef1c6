import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'
import { DEFAULT_DUPLICATE_FIELDS } from '@utils/queue-policy.js'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3005,
    },
    host: {
      type: 'string',
      default: '127.0.0.1',
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
    // Queue Configuration
    displayLimit: {
      type: 'number',
      minimum: 0,
      default: 0,
    },
    historyLength: {
      type: 'number',
      minimum: 0,
      default: 20,
    },
    stickyHistory: {
      type: 'boolean',
      default: true,
    },
    stackDuplicates: {
      type: 'boolean',
      default: true,
    },
    duplicateFields: {
      type: 'string',
      default: DEFAULT_DUPLICATE_FIELDS,
    },
    // Timeout Configuration (milliseconds, 0 = never)
    timeoutLow: {
      type: 'number',
      default: 10000,
    },
    timeoutNormal: {
      type: 'number',
      default: 10000,
    },
    timeoutCritical: {
      type: 'number',
      default: 0,
    },
    fullscreenOverride: {
      type: 'boolean',
      default: true,
    },
    fullscreenTimeout: {
      type: 'number',
      default: 3000,
    },
    showAgeThreshold: {
      type: 'number',
      default: 60000,
    },
    driverFallbackInterval: {
      type: 'number',
      minimum: 1,
      default: 1000,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

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

    if (fastify.config.displayLimit === 0) {
      fastify.log.debug('No display limit configured, showing every notification')
    }
  },
  {
    name: 'config',
  },
)
