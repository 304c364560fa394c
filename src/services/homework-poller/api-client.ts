import type {
  HomeworkApiResponse,
  HomeworkStatusSource,
} from '@root/types/homework.types.js'
import { PollError } from '@utils/homework/poll-error.js'
import { USER_AGENT } from '@utils/version.js'

export interface HomeworkApiClientOptions {
  endpoint: string
  token: string
  timeoutMs: number
}

/**
 * HTTP client for the homework status API.
 *
 * Resolves with the raw status and body of any answer the server gives;
 * interpreting them is the poll cycle's job.
 */
export class HomeworkApiClient implements HomeworkStatusSource {
  readonly endpoint: string
  private readonly token: string
  private readonly timeoutMs: number

  constructor(options: HomeworkApiClientOptions) {
    this.endpoint = options.endpoint
    this.token = options.token
    this.timeoutMs = options.timeoutMs
  }

  /**
   * Requests every status change since `fromDate`.
   *
   * @param fromDate - Unix timestamp (seconds) sent as `from_date`
   * @param signal - Aborts the request early, e.g. on shutdown
   * @throws {PollError} `transport` when no HTTP answer was received
   */
  async fetchStatuses(
    fromDate: number,
    signal?: AbortSignal,
  ): Promise<HomeworkApiResponse> {
    const url = new URL(this.endpoint)
    url.searchParams.set('from_date', String(fromDate))

    const timeout = AbortSignal.timeout(this.timeoutMs)
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `OAuth ${this.token}`,
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
        },
        signal: requestSignal,
      })
      return { status: response.status, body: await response.text() }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new PollError(
        'transport',
        `Ошибка при обращении к ${this.endpoint}: ${reason}`,
        {
          context: {
            endpoint: this.endpoint,
            cursor: fromDate,
            timedOut: timeout.aborted,
          },
          cause: error,
        },
      )
    }
  }
}
