import { PollError } from '@utils/homework/poll-error.js'
import type { FastifyRequest } from 'fastify'
import { afterEach, describe, expect, it, vi } from 'vitest'
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

// Now import the module after mocks are set up
const {
  createLoggerConfig,
  createServiceLogger,
  filename,
  redactUrl,
  serializeError,
  serializeRequest,
  validLogLevels,
} = await import('@utils/logger.js')

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
      const parent = createMockLogger()

      createServiceLogger(parent, 'telegram')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[TELEGRAM] ' },
      )
    })

    it('should uppercase mixed-case service names', () => {
      const parent = createMockLogger()

      createServiceLogger(parent, 'HomeworkPoller')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[HOMEWORKPOLLER] ' },
      )
    })
  })

  describe('serializeError', () => {
    it('should serialize primitive errors', () => {
      expect(serializeError('string error')).toEqual({
        message: 'string error',
        type: 'StringError',
      })
      expect(serializeError(42)).toEqual({ message: '42', type: 'NumberError' })
      expect(serializeError(false)).toEqual({
        message: 'false',
        type: 'BooleanError',
      })
    })

    it('should pass null and undefined through', () => {
      expect(serializeError(null)).toBeNull()
      expect(serializeError(undefined)).toBeUndefined()
    })

    it('should serialize a TypeError with its type', () => {
      const result = serializeError(new TypeError('fetch failed'))

      expect(result).toMatchObject({
        message: 'fetch failed',
        name: 'TypeError',
        type: 'TypeError',
      })
    })

    it('should keep kind, context and cause of poll errors', () => {
      const error = new PollError('status-code', 'bad status', {
        context: { statusCode: 503, cursor: 100 },
        cause: new Error('socket hang up'),
      })

      const result = serializeError(error)

      expect(result).toMatchObject({
        message: 'bad status',
        name: 'PollError',
        type: 'Error',
        kind: 'status-code',
        context: { statusCode: 503, cursor: 100 },
        cause: { message: 'socket hang up', type: 'Error' },
      })
    })

    it('should stringify a cause that is a plain object', () => {
      const error = new Error('outer', { cause: { code: 'E1' } })

      expect(serializeError(error)).toMatchObject({
        cause: '[object Object]',
      })
    })

    it('should name plain objects without a name UnknownError', () => {
      expect(serializeError({ message: 'odd' })).toEqual({
        message: 'odd',
        type: 'UnknownError',
      })
    })
  })

  describe('redactUrl', () => {
    it('should redact token and apiKey query values', () => {
      expect(redactUrl('/v1/poller/status?token=abc&apiKey=def&x=1')).toBe(
        '/v1/poller/status?token=[REDACTED]&apiKey=[REDACTED]&x=1',
      )
    })

    it('should redact bot tokens in Bot API paths', () => {
      expect(
        redactUrl('https://telegram.test/bot123:test-secret/sendMessage'),
      ).toBe('https://telegram.test/bot[REDACTED]/sendMessage')
    })

    it('should leave other URLs untouched', () => {
      expect(redactUrl('/health')).toBe('/health')
    })
  })

  describe('serializeRequest', () => {
    it('should serialize request information with a redacted URL', () => {
      const request = {
        method: 'GET',
        url: '/health?token=secret',
        headers: { host: 'localhost:3003' },
        ip: '127.0.0.1',
        socket: { remotePort: 54321 },
      } as unknown as FastifyRequest

      expect(serializeRequest(request)).toEqual({
        method: 'GET',
        url: '/health?token=[REDACTED]',
        host: 'localhost:3003',
        remoteAddress: '127.0.0.1',
        remotePort: 54321,
      })
    })
  })

  describe('filename', () => {
    it('should name the active log file without a date', () => {
      expect(filename(0)).toBe('homework-watcher-current.log')
    })

    it('should name rotated files by local date and index', () => {
      const date = new Date(2024, 2, 7, 12, 0, 0)

      expect(filename(date)).toBe('homework-watcher-2024-03-07.log')
      expect(filename(date.getTime(), 2)).toBe(
        'homework-watcher-2024-03-07-2.log',
      )
    })
  })

  describe('createLoggerConfig', () => {
    afterEach(() => {
      delete process.env.enableConsoleOutput
    })

    it('should return file-only config when enableConsoleOutput is false', () => {
      process.env.enableConsoleOutput = 'false'

      const config = createLoggerConfig()

      expect(config).toHaveProperty('level', 'info')
      expect(config).toHaveProperty('stream')
      expect(config).toHaveProperty('serializers.error', serializeError)
      expect(config).toHaveProperty('serializers.req', serializeRequest)
    })
  })
})
