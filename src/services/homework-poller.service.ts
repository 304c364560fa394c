/**
 * Homework Poller Service
 *
 * Drives the poll loop: one cycle per retry period, every failure contained
 * inside its own cycle and reported through the same notification gate as
 * status changes.
 */
import type {
  CycleOutcome,
  HomeworkStatusSource,
  Notifier,
  PollCycleState,
  PollerState,
  PollerStatus,
} from '@root/types/homework.types.js'
import { filterMessage } from '@services/homework-poller/notification-gate.js'
import { runPollCycle } from '@services/homework-poller/poll-cycle.js'
import type { SchedulerService } from '@services/scheduler.service.js'
import {
  classifyPollError,
  formatPollErrorMessage,
  isBenignPollError,
} from '@utils/homework/poll-error.js'
import type { FastifyBaseLogger } from 'fastify'

export const POLLER_JOB_NAME = 'homework-poller'

/** Default time between two cycles */
export const RETRY_PERIOD_SECONDS = 600

export interface HomeworkPollerOptions {
  source: HomeworkStatusSource
  notifier: Notifier
  chatId: string
  retryPeriodSeconds?: number
  /** Clock used to seed the cursor, in milliseconds */
  now?: () => number
}

export class HomeworkPollerService {
  private readonly state: PollCycleState
  private readonly retryPeriodSeconds: number
  private lifecycle: PollerState = 'stopped'
  private cycles = 0
  private lastCycle: PollerStatus['lastCycle'] = null
  private abortController = new AbortController()

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly scheduler: SchedulerService,
    private readonly options: HomeworkPollerOptions,
  ) {
    const now = options.now ?? Date.now
    this.retryPeriodSeconds = options.retryPeriodSeconds ?? RETRY_PERIOD_SECONDS
    this.state = {
      cursor: Math.floor(now() / 1000),
      lastMessage: '',
    }
  }

  /**
   * Starts the loop. The first cycle runs right away, the following ones
   * every `retryPeriodSeconds`.
   *
   * @returns true if the loop is running
   */
  start(): boolean {
    if (this.lifecycle === 'running') {
      return true
    }

    this.abortController = new AbortController()
    const scheduled = this.scheduler.scheduleJob(
      POLLER_JOB_NAME,
      { seconds: this.retryPeriodSeconds, runImmediately: true },
      () => this.runCycle(),
    )
    if (!scheduled) {
      return false
    }

    this.lifecycle = 'running'
    this.log.info(
      { cursor: this.state.cursor, retryPeriodSeconds: this.retryPeriodSeconds },
      'Homework poller started',
    )
    return true
  }

  /**
   * Stops the loop and aborts a request that is still in flight.
   */
  stop(): void {
    if (this.lifecycle !== 'running') {
      return
    }
    this.abortController.abort()
    this.scheduler.unscheduleJob(POLLER_JOB_NAME)
    this.lifecycle = 'stopped'
    this.log.info('Homework poller stopped')
  }

  /**
   * Runs a single cycle. Never rejects: a failed cycle is classified, logged
   * and turned into a diagnostic message for the chat.
   */
  async runCycle(): Promise<void> {
    const signal = this.abortController.signal
    const gateDeps = {
      notifier: this.options.notifier,
      chatId: this.options.chatId,
      log: this.log,
    }
    let outcome: CycleOutcome = 'ok'
    let errorMessage: string | undefined

    try {
      const message = await runPollCycle(this.state, {
        ...gateDeps,
        source: this.options.source,
        signal,
      })
      this.log.debug({ cursor: this.state.cursor, message }, 'Cycle completed')
    } catch (error) {
      const pollError = classifyPollError(error)
      outcome = pollError.kind
      errorMessage = pollError.message

      if (signal.aborted) {
        this.log.debug('Cycle interrupted by shutdown')
        return
      }

      if (isBenignPollError(pollError)) {
        this.log.info({ cursor: this.state.cursor }, pollError.message)
      } else {
        this.log.error(
          { error: pollError, kind: pollError.kind, cursor: this.state.cursor },
          'Homework poll cycle failed',
        )
      }

      this.state.lastMessage = await filterMessage(
        this.state.lastMessage,
        formatPollErrorMessage(pollError),
        gateDeps,
      )
    } finally {
      this.cycles += 1
      this.lastCycle = {
        time: new Date().toISOString(),
        outcome,
        ...(errorMessage !== undefined ? { error: errorMessage } : {}),
      }
    }
  }

  getStatus(): PollerStatus {
    return {
      state: this.lifecycle,
      cursor: this.state.cursor,
      lastMessage: this.state.lastMessage,
      cycles: this.cycles,
      retryPeriodSeconds: this.retryPeriodSeconds,
      lastCycle: this.lastCycle,
    }
  }
}
