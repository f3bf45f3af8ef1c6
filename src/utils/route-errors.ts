import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface LogRouteErrorOptions {
  message?: string
  level?: 'error' | 'warn' | 'info'
  context?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Logs an error raised inside a route handler together with the route it
 * came from.
 */
export function logRouteError(
  logger: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: LogRouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  logger[level](
    { error, route, ...context, ...fields },
    message ?? `Error in route ${route}`,
  )
}
