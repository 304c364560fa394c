import {
  botFingerprint,
  buildSendMessageUrl,
  fitMessageText,
  sendTelegramMessage,
  type TelegramDeps,
} from '@services/notifications/channels/telegram.js'
import { TelegramService } from '@services/notifications/channels/telegram.service.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'
import {
  TELEGRAM_SEND_MESSAGE_URL,
  TEST_CHAT_ID,
  TEST_TELEGRAM_API_URL,
  TEST_TELEGRAM_TOKEN,
} from '../../../../mocks/msw-handlers.js'
import { server } from '../../../../setup/msw-setup.js'

function createDeps(): TelegramDeps {
  return {
    log: createMockLogger(),
    config: {
      telegramToken: TEST_TELEGRAM_TOKEN,
      telegramApiUrl: TEST_TELEGRAM_API_URL,
      requestTimeoutMs: 1000,
    },
  }
}

describe('telegram channel', () => {
  describe('buildSendMessageUrl', () => {
    it('should join the API base and the bot token', () => {
      expect(buildSendMessageUrl('https://api.telegram.org/', 'abc')).toBe(
        'https://api.telegram.org/botabc/sendMessage',
      )
    })
  })

  describe('botFingerprint', () => {
    it('should produce a short stable hash without the token', () => {
      const fingerprint = botFingerprint(TEST_TELEGRAM_TOKEN)

      expect(fingerprint).toHaveLength(8)
      expect(fingerprint).toBe(botFingerprint(TEST_TELEGRAM_TOKEN))
      expect(fingerprint).not.toContain(TEST_TELEGRAM_TOKEN)
    })
  })

  describe('fitMessageText', () => {
    it('should keep a message within the limit as is', () => {
      const text = 'a'.repeat(4096)

      expect(fitMessageText(text)).toBe(text)
    })

    it('should cut a longer message to the limit with an ellipsis', () => {
      const fitted = fitMessageText(`${'a'.repeat(4093)}bbbb`)

      expect(fitted).toHaveLength(4096)
      expect(fitted).toBe(`${'a'.repeat(4093)}...`)
    })
  })

  describe('sendTelegramMessage', () => {
    it('should post chat_id and text as JSON', async () => {
      let body: unknown

      server.use(
        http.post(TELEGRAM_SEND_MESSAGE_URL, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({ ok: true, result: {} })
        }),
      )

      const sent = await sendTelegramMessage(TEST_CHAT_ID, 'hello', createDeps())

      expect(sent).toBe(true)
      expect(body).toEqual({ chat_id: TEST_CHAT_ID, text: 'hello' })
    })

    it('should truncate text over the Bot API limit instead of refusing it', async () => {
      let body: unknown

      server.use(
        http.post(TELEGRAM_SEND_MESSAGE_URL, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({ ok: true, result: {} })
        }),
      )

      const sent = await sendTelegramMessage(
        TEST_CHAT_ID,
        'x'.repeat(5000),
        createDeps(),
      )

      expect(sent).toBe(true)
      expect(body).toEqual({
        chat_id: TEST_CHAT_ID,
        text: `${'x'.repeat(4093)}...`,
      })
    })

    it('should report false when Telegram rejects the message', async () => {
      server.use(
        http.post(TELEGRAM_SEND_MESSAGE_URL, () =>
          HttpResponse.json(
            { ok: false, error_code: 400, description: 'chat not found' },
            { status: 400 },
          ),
        ),
      )
      const deps = createDeps()

      const sent = await sendTelegramMessage(TEST_CHAT_ID, 'hello', deps)

      expect(sent).toBe(false)
      expect(deps.log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ status: 400, description: 'chat not found' }),
        'Telegram sendMessage request failed',
      )
    })

    it('should report false when the network fails', async () => {
      server.use(http.post(TELEGRAM_SEND_MESSAGE_URL, () => HttpResponse.error()))
      const deps = createDeps()

      const sent = await sendTelegramMessage(TEST_CHAT_ID, 'hello', deps)

      expect(sent).toBe(false)
      expect(deps.log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ bot: botFingerprint(TEST_TELEGRAM_TOKEN) }),
        'Error sending Telegram message',
      )
    })

    it('should refuse an empty message without calling the API', async () => {
      let called = false
      server.use(
        http.post(TELEGRAM_SEND_MESSAGE_URL, () => {
          called = true
          return HttpResponse.json({ ok: true, result: {} })
        }),
      )

      const sent = await sendTelegramMessage(TEST_CHAT_ID, '', createDeps())

      expect(sent).toBe(false)
      expect(called).toBe(false)
    })
  })

  describe('TelegramService', () => {
    it('should send through the configured bot', async () => {
      const service = new TelegramService(createMockLogger(), {
        telegramToken: TEST_TELEGRAM_TOKEN,
        telegramApiUrl: TEST_TELEGRAM_API_URL,
        requestTimeoutMs: 1000,
      })

      await expect(service.send(TEST_CHAT_ID, 'status changed')).resolves.toBe(
        true,
      )
    })
  })
})
