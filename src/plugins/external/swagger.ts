import fp from 'fastify-plugin'
import fastifySwagger from '@fastify/swagger'
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  return {
    openapi: {
      info: {
        title: 'notiqd API',
        description:
          'Control API of the notiqd notification queue daemon: submit, replace and close notifications, manage history and pause display',
        version: 'V1',
      },
      servers: [
        {
          url: `http://${fastify.config.host}:${fastify.config.port}`,
          description: 'Local daemon',
        },
      ],
      tags: [
        {
          name: 'Notifications',
          description: 'Submitting, replacing and closing notifications',
        },
        {
          name: 'History',
          description: 'Notification history',
        },
        {
          name: 'Control',
          description: 'Pause, display limit and desktop state',
        },
        {
          name: 'System',
          description: 'Health and status',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * Register Swagger with combined config
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
