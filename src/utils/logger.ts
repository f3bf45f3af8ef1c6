import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type DaemonLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

type SerializableError = Error | Record<string, unknown> | string | number

/**
 * Creates an error serializer that keeps message, name, stack and cause
 * together with any custom enumerable properties.
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      return {
        message: String(err),
        type: typeof err === 'string' ? 'StringError' : 'NumberError',
      }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name

    if (err instanceof Error) {
      serialized.type = err.constructor.name
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number'
          ? serialize(cause)
          : cause
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * Without a date returns 'notiqd-current.log', otherwise
 * 'notiqd-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'notiqd-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `notiqd-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logs, falling back to stdout when the
 * log directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory =
    process.env.logDir ?? resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(
  stream: rfs.RotatingFileStream | NodeJS.WriteStream,
): FileLoggerOptions {
  return {
    level: 'info',
    stream,
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Always logs to file. `enableConsoleOutput=false` turns off the
 * pretty-printed terminal stream.
 */
export function createLoggerConfig(): DaemonLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return getFileOptions(fileStream)
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: {
      error: createErrorSerializer(),
    },
  }
}

/**
 * Creates a child logger whose messages are prefixed with the service name.
 *
 * @example
 * const log = createServiceLogger(fastify.log, 'queue-driver')
 * log.info('Started') // "[QUEUE-DRIVER] Started"
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
