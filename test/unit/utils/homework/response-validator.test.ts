import { PollError } from '@utils/homework/poll-error.js'
import {
  checkResponse,
  validateHomeworksResponse,
} from '@utils/homework/response-validator.js'
import { describe, expect, it } from 'vitest'

function captureError(fn: () => unknown): PollError {
  try {
    fn()
  } catch (error) {
    if (error instanceof PollError) return error
    throw error
  }
  throw new Error('Expected a PollError to be thrown')
}

describe('response-validator', () => {
  describe('checkResponse', () => {
    it('should return the homeworks array unchanged', () => {
      const homeworks = [
        { homework_name: 'proj1', status: 'reviewing' },
        { homework_name: 'proj0', status: 'approved' },
      ]

      const result = checkResponse({ current_date: 1000, homeworks })

      expect(result).toBe(homeworks)
    })

    it('should reject payloads that are not objects', () => {
      for (const payload of [null, 'text', 42, true, [1, 2]]) {
        const error = captureError(() => checkResponse(payload))
        expect(error.kind).toBe('shape')
        expect(error.message).toBe('Полученные данные не являются словарем')
      }
    })

    it('should report a missing current_date', () => {
      const error = captureError(() => checkResponse({ homeworks: [{}] }))

      expect(error.kind).toBe('missing-key')
      expect(error.message).toBe('Отсутствуют ожидаемые ключи: current_date')
    })

    it('should report a missing homeworks key', () => {
      const error = captureError(() => checkResponse({ current_date: 1000 }))

      expect(error.kind).toBe('missing-key')
      expect(error.message).toBe('Отсутствуют ожидаемые ключи: homeworks')
    })

    it('should report both keys when both are missing', () => {
      const error = captureError(() => checkResponse({}))

      expect(error.kind).toBe('missing-key')
      expect(error.context).toEqual({ missing: 'current_date,homeworks' })
    })

    it('should require key presence rather than a truthy current_date', () => {
      // current_date of 0 is falsy but present
      expect(
        checkResponse({
          current_date: 0,
          homeworks: [{ homework_name: 'a', status: 'approved' }],
        }),
      ).toHaveLength(1)
    })

    it('should reject homeworks that is not an array', () => {
      const error = captureError(() =>
        checkResponse({ current_date: 1000, homeworks: { status: 'approved' } }),
      )

      expect(error.kind).toBe('shape')
      expect(error.message).toBe('Данные homeworks не являются списком')
      expect(error.context).toEqual({ field: 'homeworks', received: 'object' })
    })

    it('should reject a non-integer current_date', () => {
      const error = captureError(() =>
        checkResponse({ current_date: '1000', homeworks: [{}] }),
      )

      expect(error.kind).toBe('shape')
      expect(error.message).toBe(
        'Значение current_date не является целым числом',
      )
    })

    it('should report an empty homeworks array', () => {
      const error = captureError(() =>
        checkResponse({ current_date: 1000, homeworks: [] }),
      )

      expect(error.kind).toBe('empty-result')
      expect(error.message).toBe('Отсутствует информация о домашнем задании')
    })
  })

  describe('validateHomeworksResponse', () => {
    it('should return current_date alongside the homeworks', () => {
      const homeworks = [{ homework_name: 'proj1', status: 'rejected' }]

      const result = validateHomeworksResponse({
        current_date: 1700000000,
        homeworks,
      })

      expect(result.current_date).toBe(1700000000)
      expect(result.homeworks).toBe(homeworks)
    })
  })
})
