/** Review status codes reported by the homework API */
export type HomeworkStatus = 'approved' | 'reviewing' | 'rejected'

/** Decoded body of a successful homework API call */
export interface HomeworksResponse {
  current_date: number
  homeworks: unknown[]
}

/** Raw transport result from the homework API */
export interface HomeworkApiResponse {
  status: number
  body: string
}

/**
 * Source of homework statuses.
 * Resolves with whatever the server answered; rejects only when the request
 * itself could not be completed.
 */
export interface HomeworkStatusSource {
  readonly endpoint: string
  fetchStatuses(
    fromDate: number,
    signal?: AbortSignal,
  ): Promise<HomeworkApiResponse>
}

/** Outbound chat channel */
export interface Notifier {
  send(chatId: string, text: string): Promise<boolean>
}

export type PollerState = 'running' | 'stopped'

export type CycleOutcome = 'ok' | PollErrorKind

export type PollErrorKind =
  | 'transport'
  | 'status-code'
  | 'decode'
  | 'shape'
  | 'missing-key'
  | 'empty-result'
  | 'empty-status'
  | 'unknown-verdict'
  | 'unclassified'

/** Mutable per-process state carried from one cycle to the next */
export interface PollCycleState {
  cursor: number
  lastMessage: string
}

export interface PollerStatus {
  state: PollerState
  cursor: number
  lastMessage: string
  cycles: number
  retryPeriodSeconds: number
  lastCycle: {
    time: string
    outcome: CycleOutcome
    error?: string
  } | null
}
