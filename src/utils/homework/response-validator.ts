import {
  HOMEWORKS_RESPONSE_KEYS,
  HomeworksResponseSchema,
  type JsonObject,
  JsonObjectSchema,
} from '@schemas/homework/homework-response.schema.js'
import type { HomeworksResponse } from '@root/types/homework.types.js'
import { PollError } from './poll-error.js'

/**
 * Narrows an arbitrary decoded JSON value to a plain object.
 *
 * @throws {PollError} `shape` when the value is not an object
 */
export function assertJsonObject(value: unknown, message: string): JsonObject {
  const result = JsonObjectSchema.safeParse(value)
  if (!result.success) {
    throw new PollError('shape', message, {
      context: { received: describeJsonType(value) },
    })
  }
  return result.data
}

/**
 * Checks a decoded homework API payload against the documented shape.
 *
 * Both `current_date` and `homeworks` have to be present, `homeworks` has to
 * be a non-empty array. The `homeworks` array is returned as received.
 *
 * @throws {PollError} `shape`, `missing-key` or `empty-result`
 */
export function validateHomeworksResponse(payload: unknown): HomeworksResponse {
  const response = assertJsonObject(
    payload,
    'Полученные данные не являются словарем',
  )

  const missing = HOMEWORKS_RESPONSE_KEYS.filter((key) => !(key in response))
  if (missing.length > 0) {
    throw new PollError(
      'missing-key',
      `Отсутствуют ожидаемые ключи: ${missing.join(', ')}`,
      { context: { missing: missing.join(',') } },
    )
  }

  const parsed = HomeworksResponseSchema.safeParse(response)
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0]
    throw new PollError(
      'shape',
      field === 'homeworks'
        ? 'Данные homeworks не являются списком'
        : 'Значение current_date не является целым числом',
      {
        context: {
          field: String(field),
          received: describeJsonType(response[String(field)]),
        },
      },
    )
  }

  const homeworks = response.homeworks
  if (!Array.isArray(homeworks) || homeworks.length === 0) {
    throw new PollError(
      'empty-result',
      'Отсутствует информация о домашнем задании',
    )
  }

  return { current_date: parsed.data.current_date, homeworks }
}

/**
 * Returns the `homeworks` array of a payload that passes
 * {@link validateHomeworksResponse}.
 */
export function checkResponse(payload: unknown): unknown[] {
  return validateHomeworksResponse(payload).homeworks
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
