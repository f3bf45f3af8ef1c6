import fp from 'fastify-plugin'
import { FastifySSEPlugin } from 'fastify-sse-v2'
import type { FastifyInstance } from 'fastify'

/**
 * Server-Sent Events support for streaming close signals
 * @see {@link https://github.com/mpetrunic/fastify-sse-v2}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(FastifySSEPlugin)
  },
  {
    name: 'fastify-sse-v2',
  },
)
