import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type {
  FastifyInstance,
  FastifyPluginOptions,
  FastifyServerOptions,
} from 'fastify'

const dirname = path.dirname(fileURLToPath(import.meta.url))

export const options: FastifyServerOptions = {
  ajv: {
    customOptions: {
      coerceTypes: 'array',
      removeAdditional: 'all',
    },
  },
}

/**
 * Configures the Fastify server by autoloading external plugins, the
 * notification queue plugins and the route handlers.
 *
 * Error and not-found handling live in plugins/custom so that they apply to
 * every route the autoloader registers.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  await fastify.register(fastifyAutoload, {
    dir: path.join(dirname, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
