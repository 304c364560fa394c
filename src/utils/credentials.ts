import type { Config, RequiredCredential } from '@root/types/config.types.js'

export const REQUIRED_CREDENTIALS: readonly RequiredCredential[] = [
  'practicumToken',
  'telegramToken',
  'telegramChatId',
]

/**
 * Thrown at startup when the poller cannot run for lack of credentials.
 */
export class MissingCredentialsError extends Error {
  constructor(public readonly missing: RequiredCredential[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`)
    this.name = 'MissingCredentialsError'
  }
}

/**
 * Lists the required credentials that are absent or blank, in declaration
 * order.
 */
export function findMissingCredentials(
  config: Pick<Config, RequiredCredential>,
): RequiredCredential[] {
  return REQUIRED_CREDENTIALS.filter((key) => config[key].trim() === '')
}
