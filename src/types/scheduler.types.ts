/**
 * Type for configuration of interval jobs
 */
export interface IntervalConfig {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

/**
 * Type for job run status information
 */
export interface JobRunInfo {
  time: string
  status: 'completed' | 'failed' | 'pending'
  error?: string
}

/**
 * In-memory record of a registered job
 */
export interface JobStatus {
  name: string
  config: IntervalConfig
  last_run: JobRunInfo | null
  next_run: JobRunInfo | null
}
