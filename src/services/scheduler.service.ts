/**
 * Scheduler Service
 *
 * Provides a centralized job scheduling system for the application using toad-scheduler.
 * Jobs are kept in memory only; a restart registers them again from scratch.
 *
 * Responsible for:
 * - Managing scheduled job registration and execution
 * - Handling job failures and logging
 * - Tracking last and next run of every job
 *
 * @example
 * const schedulerService = new SchedulerService(log)
 * schedulerService.scheduleJob('my-job', { minutes: 10 }, async () => {
 *   // Job implementation
 * })
 */
import type {
  IntervalConfig,
  JobStatus,
} from '@root/types/scheduler.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

/** Run history of every registered job, by job name */
type JobMap = Map<string, JobStatus>

/**
 * Converts an interval configuration to milliseconds.
 */
export function intervalToMs(config: IntervalConfig): number {
  return (
    (config.days ?? 0) * 86_400_000 +
    (config.hours ?? 0) * 3_600_000 +
    (config.minutes ?? 0) * 60_000 +
    (config.seconds ?? 0) * 1000
  )
}

export class SchedulerService {
  /** The scheduler instance */
  private readonly scheduler: ToadScheduler

  /** Map of job names to their run history */
  private readonly jobs: JobMap = new Map()

  /**
   * Creates a new SchedulerService instance
   *
   * @param log - Fastify logger for recording operations
   */
  constructor(private readonly log: FastifyBaseLogger) {
    this.scheduler = new ToadScheduler()
    this.log.debug('Scheduler service initialized')
  }

  /**
   * Creates a job instance that never runs two executions at once
   */
  private createJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): SimpleIntervalJob {
    const intervalMs = intervalToMs(config)

    // Async task that wraps the handler and records run history
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        const entry = this.jobs.get(name)
        try {
          this.log.debug(`Running scheduled job: ${name}`)
          await handler(name)

          if (entry) {
            entry.last_run = {
              time: new Date().toISOString(),
              status: 'completed',
            }
          }
          this.log.debug(`Job ${name} completed successfully`)
        } catch (error) {
          this.log.error({ error }, `Error in job ${name}`)
          if (entry) {
            entry.last_run = {
              time: new Date().toISOString(),
              status: 'failed',
              error: error instanceof Error ? error.message : String(error),
            }
          }
        } finally {
          if (entry) {
            entry.next_run = {
              time: new Date(Date.now() + intervalMs).toISOString(),
              status: 'pending',
            }
          }
        }
      },
      (error: Error) => {
        this.log.error({ error }, `Unhandled error in job ${name}`)
      },
    )

    return new SimpleIntervalJob(
      {
        days: config.days,
        hours: config.hours,
        minutes: config.minutes,
        seconds: config.seconds,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      { id: name, preventOverrun: true },
    )
  }

  /**
   * Register and start an interval job
   *
   * @param name - Unique name for the job
   * @param config - Interval between runs
   * @param handler - Function to execute when the job runs
   * @returns true if the job was scheduled
   */
  scheduleJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): boolean {
    if (intervalToMs(config) <= 0) {
      this.log.error({ config }, `Refusing to schedule job ${name}`)
      return false
    }

    try {
      if (this.jobs.has(name)) {
        this.scheduler.removeById(name)
        this.jobs.delete(name)
      }

      const status: JobStatus = {
        name,
        config,
        last_run: null,
        next_run: {
          time: new Date(
            config.runImmediately ? Date.now() : Date.now() + intervalToMs(config),
          ).toISOString(),
          status: 'pending',
        },
      }
      const job = this.createJob(name, config, handler)
      this.jobs.set(name, status)
      this.scheduler.addSimpleIntervalJob(job)

      this.log.info(`Job ${name} scheduled successfully`)
      return true
    } catch (error) {
      this.log.error({ error }, `Error scheduling job ${name}`)
      this.jobs.delete(name)
      return false
    }
  }

  /**
   * Stop and remove a scheduled job
   *
   * @param name - Name of the job to remove
   * @returns true if a job was removed
   */
  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) {
      return false
    }
    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled`)
    return true
  }

  /**
   * Run history of a job, or null if no such job exists
   */
  getJobStatus(name: string): JobStatus | null {
    return this.jobs.get(name) ?? null
  }

  /**
   * Get all active job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs.keys())
  }

  /**
   * Stop all jobs
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    this.jobs.clear()
  }
}
