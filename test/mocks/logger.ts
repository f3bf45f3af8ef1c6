import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'

/**
 * Mock Fastify logger. Every level is a `vi.fn()`; `child()` hands out a
 * fresh mock so service loggers created with `createServiceLogger` can be
 * asserted on separately from their parent.
 *
 * @example
 * const log = createMockLogger()
 * parseDuplicateFields('summary,timeout', log)
 * expect(log.warn).toHaveBeenCalledOnce()
 */
export function createMockLogger(level = 'silent'): FastifyBaseLogger {
  const logger = {
    level,
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    silent: vi.fn(),
    child: vi.fn(() => createMockLogger(level)),
  } as unknown as FastifyBaseLogger

  return logger
}
