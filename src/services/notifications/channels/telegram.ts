/**
 * Telegram Channel
 *
 * Pure functions for sending messages through the Telegram Bot API.
 * No state, no bot client dependency - just HTTP POST to sendMessage.
 */

import { createHash } from 'node:crypto'
import {
  TELEGRAM_MAX_MESSAGE_LENGTH,
  TelegramApiResponseSchema,
  type TelegramSendMessageBody,
  TelegramSendMessageBodySchema,
} from '@schemas/notifications/telegram.schema.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'

export interface TelegramDeps {
  log: FastifyBaseLogger
  config: {
    telegramToken: string
    telegramApiUrl: string
    requestTimeoutMs: number
  }
}

/**
 * Generates a stable, anonymized fingerprint for a bot token.
 * Used for safe logging without exposing the token itself.
 */
export function botFingerprint(token: string): string {
  return createHash('sha256').update(token).digest('hex').slice(0, 8)
}

/**
 * Builds the sendMessage URL for a bot.
 */
export function buildSendMessageUrl(apiUrl: string, token: string): string {
  const base = apiUrl.replace(/\/+$/, '')
  return `${base}/bot${token}/sendMessage`
}

/**
 * Cuts a message down to the Bot API length limit.
 */
export function fitMessageText(text: string): string {
  return text.length > TELEGRAM_MAX_MESSAGE_LENGTH
    ? `${text.slice(0, TELEGRAM_MAX_MESSAGE_LENGTH - 3)}...`
    : text
}

/**
 * Sends a text message to a Telegram chat.
 *
 * Never throws: any failure is logged and reported as `false`. Text over
 * the Bot API limit is truncated.
 *
 * @param chatId - Destination chat identifier
 * @param text - Message body
 * @param deps - Dependencies (logger, config)
 * @returns true if Telegram accepted the message
 */
export async function sendTelegramMessage(
  chatId: string,
  text: string,
  deps: TelegramDeps,
): Promise<boolean> {
  const { log, config } = deps
  const bot = botFingerprint(config.telegramToken)

  const payload = TelegramSendMessageBodySchema.safeParse({
    chat_id: chatId,
    text: fitMessageText(text),
  } satisfies TelegramSendMessageBody)
  if (!payload.success) {
    log.error(
      { bot, issues: payload.error.issues },
      'Refusing to send invalid Telegram message',
    )
    return false
  }

  const startedAt = Date.now()
  try {
    const response = await fetch(
      buildSendMessageUrl(config.telegramApiUrl, config.telegramToken),
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
        },
        body: JSON.stringify(payload.data),
        signal: AbortSignal.timeout(config.requestTimeoutMs),
      },
    )

    const durationMs = Date.now() - startedAt
    const parsed = TelegramApiResponseSchema.safeParse(
      await response.json().catch(() => null),
    )
    const description = parsed.success ? parsed.data.description : undefined

    if (!response.ok || !parsed.success || !parsed.data.ok) {
      log.warn(
        {
          bot,
          status: response.status,
          description,
          durationMs,
        },
        'Telegram sendMessage request failed',
      )
      return false
    }

    log.debug({ bot, status: response.status, durationMs }, 'Message sent')
    return true
  } catch (error) {
    const durationMs = Date.now() - startedAt
    log.warn({ bot, error, durationMs }, 'Error sending Telegram message')
    return false
  }
}
