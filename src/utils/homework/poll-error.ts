import type { PollErrorKind } from '@root/types/homework.types.js'

export type PollErrorContext = Record<string, string | number | boolean>

/**
 * Error raised anywhere inside a poll cycle.
 *
 * One class carries every failure mode; `kind` tells them apart so the
 * poller can handle them with a single dispatch.
 */
export class PollError extends Error {
  readonly kind: PollErrorKind
  readonly context: PollErrorContext

  constructor(
    kind: PollErrorKind,
    message: string,
    options: { context?: PollErrorContext; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'PollError'
    this.kind = kind
    this.context = options.context ?? {}

    // Restore the prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PollError)
    }
  }
}

/** Prefix for diagnostics of failures the poller did not anticipate */
export const UNCLASSIFIED_PREFIX = 'Сбой в работе программы: '

/**
 * Normalizes anything thrown during a cycle into a {@link PollError}.
 * Errors that are already classified pass through untouched.
 */
export function classifyPollError(error: unknown): PollError {
  if (error instanceof PollError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new PollError('unclassified', message, { cause: error })
}

/**
 * Builds the chat-facing diagnostic for a failed cycle.
 */
export function formatPollErrorMessage(error: PollError): string {
  if (error.kind === 'unclassified') {
    return `${UNCLASSIFIED_PREFIX}${error.message}`
  }
  return error.message
}

/**
 * Whether a failure is part of normal operation and should stay out of the
 * error log.
 */
export function isBenignPollError(error: PollError): boolean {
  return error.kind === 'empty-result'
}
