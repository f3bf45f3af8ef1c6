import serviceApp, { options } from '@root/app.js'
import type { FastifyInstance } from 'fastify'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import type { TestContext } from 'vitest'

/**
 * Build a Fastify application instance for testing
 *
 * @param t - Optional Vitest test context for automatic cleanup
 * @returns Fastify instance ready for testing
 */
export async function build(t?: TestContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Disable logging in tests
    // Match production AJV options from server.ts
    ...options,
  })

  // Register the main app without encapsulation so tests can reach decorators
  await app.register(fp(serviceApp))

  // Auto-close app after test if context provided
  if (t) {
    t.onTestFinished(async () => {
      await app.close()
    })
  }

  return app
}
