import type { Notifier } from '@root/types/homework.types.js'
import type { FastifyBaseLogger } from 'fastify'

export interface NotificationGateDeps {
  notifier: Notifier
  chatId: string
  log: FastifyBaseLogger
}

/**
 * Decides whether a candidate message goes out and returns the message that
 * should be remembered as the last one sent.
 *
 * An unchanged candidate is dropped. A failed delivery keeps `previous`, so
 * the same candidate is retried on the next cycle instead of being lost.
 * Never rejects.
 */
export async function filterMessage(
  previous: string,
  candidate: string,
  deps: NotificationGateDeps,
): Promise<string> {
  const { notifier, chatId, log } = deps

  if (candidate === previous) {
    log.debug('Message unchanged since last notification, skipping')
    return previous
  }

  let delivered: boolean
  try {
    delivered = await notifier.send(chatId, candidate)
  } catch (error) {
    log.error({ error }, 'Notifier failed while sending message')
    return previous
  }

  if (!delivered) {
    log.error('Could not deliver notification, keeping previous message')
    return previous
  }

  log.info({ length: candidate.length }, 'Notification sent')
  return candidate
}
