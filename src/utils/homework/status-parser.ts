import { PollError } from './poll-error.js'
import { assertJsonObject } from './response-validator.js'
import { HOMEWORK_VERDICTS, isHomeworkStatus } from './verdicts.js'

/**
 * Formats the chat message for a homework whose review status changed.
 */
export function formatStatusMessage(homeworkName: string, verdict: string) {
  return `Изменился статус проверки работы "${homeworkName}". ${verdict}`
}

/**
 * Extracts the review verdict from a single homework record.
 *
 * @param homework - One entry of the `homeworks` array
 * @returns The chat message describing the record's current status
 * @throws {PollError} `shape`, `missing-key`, `empty-status` or `unknown-verdict`
 */
export function parseStatus(homework: unknown): string {
  const record = assertJsonObject(
    homework,
    'Запись о домашней работе не является словарем',
  )

  if (!('homework_name' in record)) {
    throw new PollError(
      'missing-key',
      'В ответе API отсутствует ключ homework_name',
      { context: { missing: 'homework_name' } },
    )
  }
  const homeworkName = record.homework_name
  if (typeof homeworkName !== 'string') {
    throw new PollError('shape', 'Значение homework_name не является строкой')
  }

  const status = record.status
  if (
    status === undefined ||
    status === null ||
    status === '' ||
    (Array.isArray(status) && status.length === 0)
  ) {
    throw new PollError('empty-status', 'Статус домашней работы пуст', {
      context: { homework: homeworkName },
    })
  }

  const statusCode = String(status)
  if (!isHomeworkStatus(statusCode)) {
    throw new PollError(
      'unknown-verdict',
      `Незадокументированный статус домашней работы: ${statusCode}`,
      { context: { homework: homeworkName, status: statusCode } },
    )
  }

  return formatStatusMessage(homeworkName, HOMEWORK_VERDICTS[statusCode])
}
