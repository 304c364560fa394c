/**
 * Telegram Service
 *
 * Thin wrapper exposing the stateless Telegram channel as a Notifier.
 * Constructs deps internally, delegates to pure functions.
 */

import type { Config } from '@root/types/config.types.js'
import type { Notifier } from '@root/types/homework.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { sendTelegramMessage, type TelegramDeps } from './telegram.js'

export class TelegramService implements Notifier {
  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly config: Pick<
      Config,
      'telegramToken' | 'telegramApiUrl' | 'requestTimeoutMs'
    >,
  ) {}

  private get telegramDeps(): TelegramDeps {
    return {
      log: this.log,
      config: this.config,
    }
  }

  /**
   * Sends a plain text message to the given chat.
   */
  async send(chatId: string, text: string): Promise<boolean> {
    return sendTelegramMessage(chatId, text, this.telegramDeps)
  }
}
