import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
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

type WatcherLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean
  | null
  | undefined

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

/**
 * Serializes errors for pino, keeping `kind`, `context` and `cause` of poll
 * errors alongside message and stack.
 */
export function serializeError(err: SerializableError): unknown {
  if (err == null) {
    return err
  }

  if (typeof err !== 'object') {
    const primitiveType =
      typeof err === 'string'
        ? 'StringError'
        : typeof err === 'number'
          ? 'NumberError'
          : 'BooleanError'
    return { message: String(err), type: primitiveType }
  }

  const serialized: Record<string, unknown> = {}

  if ('message' in err && err.message) serialized.message = err.message
  if ('name' in err && err.name) serialized.name = err.name

  if (err instanceof TypeError) {
    serialized.type = 'TypeError'
  } else if (err instanceof SyntaxError) {
    serialized.type = 'SyntaxError'
  } else if (err instanceof Error) {
    serialized.type = 'Error'
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
      typeof cause === 'number' ||
      typeof cause === 'boolean'
        ? serializeError(cause)
        : String(cause)
  }

  for (const [key, value] of Object.entries(err)) {
    if (!['message', 'stack', 'name', 'type', 'cause'].includes(key)) {
      serialized[key] = value
    }
  }

  return serialized
}

/**
 * Replaces the values of sensitive query parameters in a URL.
 */
export function redactUrl(url: string): string {
  return url
    .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
    .replace(/\/bot[^/]+\//g, '/bot[REDACTED]/')
}

/**
 * Serializes a Fastify request with sensitive query parameters redacted.
 */
export function serializeRequest(req: FastifyRequest) {
  return {
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  }
}

/**
 * Log file name for a rotation date; the active file has no date.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'homework-watcher-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `homework-watcher-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under `data/logs`, or falls back to
 * standard output when the directory cannot be used.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
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

const serializers = {
  req: serializeRequest,
  error: serializeError,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
    serializers,
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Always logs to file. Environment variables:
 * - enableConsoleOutput: Show logs in terminal (default: true)
 */
export function createLoggerConfig(): WatcherLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return {
      level: 'info',
      stream: fileStream,
      serializers,
    }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
      colorize: true,
    },
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers,
  }
}

/**
 * Creates a child logger whose messages carry an uppercased service prefix.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
