import { tmpdir } from 'node:os'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

vi.mock('pino', async () => {
  const actual = await vi.importActual<typeof import('pino')>('pino')
  const multistream = vi.fn((streams: unknown) => ({ streams, write: vi.fn() }))
  const transport = vi.fn((options: unknown) => ({ options, write: vi.fn() }))
  return {
    ...actual,
    multistream,
    transport,
    default: { ...actual.default, multistream, transport },
  }
})

// Now import the module after mocks are set up
const {
  createErrorSerializer,
  createLoggerConfig,
  createServiceLogger,
  filename,
  validLogLevels,
} = await import('@utils/logger.js')
const rfs = await import('rotating-file-stream')
const { default: pino } = await import('pino')

describe('logger', () => {
  describe('validLogLevels', () => {
    it('should export all valid pino log levels', () => {
      expect(validLogLevels).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ])
    })
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with uppercased service prefix', () => {
      const mockParentLogger = createMockLogger()
      const childLogger = createServiceLogger(
        mockParentLogger,
        'notification_queue',
      )

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[NOTIFICATION_QUEUE] ' },
      )
      expect(childLogger).toBeDefined()
    })

    it('should uppercase mixed-case service names', () => {
      const mockParentLogger = createMockLogger()
      createServiceLogger(mockParentLogger, 'QueueDriver')

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[QUEUEDRIVER] ' },
      )
    })
  })

  describe('filename', () => {
    it('should name the current log file', () => {
      expect(filename(0)).toBe('notiqd-current.log')
    })

    it('should name rotated files by date', () => {
      expect(filename(new Date(2026, 0, 5))).toBe('notiqd-2026-01-05.log')
    })

    it('should append the rotation index', () => {
      expect(filename(new Date(2026, 10, 23), 2)).toBe(
        'notiqd-2026-11-23-2.log',
      )
    })
  })

  describe('error serializer', () => {
    const serialize = createErrorSerializer()

    it('should keep message, name, type and stack of errors', () => {
      const error = new Error('boom')

      expect(serialize(error)).toEqual({
        message: 'boom',
        name: 'Error',
        type: 'Error',
        stack: error.stack,
      })
    })

    it('should keep custom enumerable properties', () => {
      const error = Object.assign(new Error('boom'), { code: 'E_QUEUE' })

      expect(serialize(error)).toMatchObject({ message: 'boom', code: 'E_QUEUE' })
    })

    it('should serialize the cause', () => {
      const error = new Error('outer', { cause: new TypeError('inner') })

      expect(serialize(error)).toMatchObject({
        message: 'outer',
        cause: { message: 'inner', name: 'TypeError', type: 'TypeError' },
      })
    })

    it('should wrap strings and numbers', () => {
      expect(serialize('failed')).toEqual({
        message: 'failed',
        type: 'StringError',
      })
      expect(serialize(42)).toEqual({ message: '42', type: 'NumberError' })
    })

    it('should mark plain objects without a name as unknown', () => {
      expect(serialize({ reason: 'x' })).toEqual({
        type: 'UnknownError',
        reason: 'x',
      })
    })
  })

  describe('createLoggerConfig', () => {
    const restore = (key: string, value: string | undefined) => {
      if (value === undefined) {
        delete process.env[key]
      } else {
        process.env[key] = value
      }
    }

    beforeEach(() => {
      const originalConsole = process.env.enableConsoleOutput
      const originalLogDir = process.env.logDir
      process.env.logDir = tmpdir()
      vi.mocked(rfs.createStream).mockClear()
      vi.mocked(pino.multistream).mockClear()
      vi.mocked(pino.transport).mockClear()
      return () => {
        restore('enableConsoleOutput', originalConsole)
        restore('logDir', originalLogDir)
      }
    })

    it('should log only to the rotating file when console output is off', () => {
      process.env.enableConsoleOutput = 'false'

      const config = createLoggerConfig()

      expect(config.level).toBe('info')
      expect('stream' in config).toBe(true)
      expect(rfs.createStream).toHaveBeenCalledTimes(1)
      expect(rfs.createStream).toHaveBeenCalledWith(filename, {
        size: '10M',
        path: tmpdir(),
        compress: 'gzip',
        maxFiles: 7,
      })
      expect(pino.multistream).not.toHaveBeenCalled()
    })

    it('should combine pretty console output with the file stream', () => {
      process.env.enableConsoleOutput = 'true'

      createLoggerConfig()

      expect(pino.transport).toHaveBeenCalledWith({
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          colorize: true,
        },
      })
      expect(pino.multistream).toHaveBeenCalledTimes(1)
    })
  })
})
