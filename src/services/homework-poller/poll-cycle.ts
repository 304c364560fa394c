import type {
  HomeworkStatusSource,
  PollCycleState,
} from '@root/types/homework.types.js'
import { PollError } from '@utils/homework/poll-error.js'
import { validateHomeworksResponse } from '@utils/homework/response-validator.js'
import { parseStatus } from '@utils/homework/status-parser.js'
import type { FastifyBaseLogger } from 'fastify'
import { filterMessage, type NotificationGateDeps } from './notification-gate.js'

export interface PollCycleDeps extends NotificationGateDeps {
  source: HomeworkStatusSource
  log: FastifyBaseLogger
  signal?: AbortSignal
}

/**
 * Requests statuses newer than `cursor` and decodes the JSON answer.
 *
 * @throws {PollError} `transport`, `status-code` or `decode`
 */
export async function getApiAnswer(
  cursor: number,
  deps: Pick<PollCycleDeps, 'source' | 'log' | 'signal'>,
): Promise<unknown> {
  const { source, log, signal } = deps

  log.debug({ cursor }, 'Requesting homework statuses')
  const response = await source.fetchStatuses(cursor, signal)

  if (response.status !== 200) {
    throw new PollError(
      'status-code',
      `Ошибка при запросе к ${source.endpoint}, статус ${response.status}, ` +
        `параметры запроса from_date=${cursor}, ответ сервера: ${response.body}`,
      {
        context: {
          endpoint: source.endpoint,
          statusCode: response.status,
          cursor,
          body: response.body,
        },
      },
    )
  }

  try {
    const decoded: unknown = JSON.parse(response.body)
    return decoded
  } catch (error) {
    throw new PollError(
      'decode',
      `Ответ ${source.endpoint} не является корректным JSON`,
      { context: { endpoint: source.endpoint, cursor }, cause: error },
    )
  }
}

/**
 * Runs one fetch → validate → interpret → notify iteration.
 *
 * The cursor moves forward as soon as the answer is validated, before the
 * first record is interpreted. `state.lastMessage` is only touched by the
 * notification gate. Failures propagate to the caller.
 *
 * @returns The status message produced for the first homework record
 */
export async function runPollCycle(
  state: PollCycleState,
  deps: PollCycleDeps,
): Promise<string> {
  const payload = await getApiAnswer(state.cursor, deps)
  const { current_date, homeworks } = validateHomeworksResponse(payload)

  if (current_date > state.cursor) {
    state.cursor = current_date
  } else if (current_date < state.cursor) {
    deps.log.warn(
      { cursor: state.cursor, currentDate: current_date },
      'Server reported an earlier current_date, keeping cursor',
    )
  }

  const message = parseStatus(homeworks[0])
  state.lastMessage = await filterMessage(state.lastMessage, message, deps)
  return message
}
