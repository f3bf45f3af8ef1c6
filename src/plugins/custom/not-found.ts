import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * 404 handler for requests outside the control API
 */
async function notFoundHandler(fastify: FastifyInstance) {
  fastify.setNotFoundHandler((request, reply) => {
    const path = request.url.split('?')[0]
    request.log.debug(
      { request: { id: request.id, method: request.method, path } },
      'Unknown route requested',
    )
    reply.code(404)
    const response: ErrorResponse = {
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: `Route ${request.method} ${path} not found`,
    }
    return response
  })
}

export default fp(notFoundHandler, {
  name: 'not-found',
})
