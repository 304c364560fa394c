import { z } from 'zod'

/** Longest `text` the Bot API accepts in sendMessage */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096

export const TelegramSendMessageBodySchema = z.object({
  chat_id: z.string().min(1),
  text: z.string().min(1).max(TELEGRAM_MAX_MESSAGE_LENGTH),
})

// Bot API envelope; `result` is ignored
export const TelegramApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
})

export type TelegramSendMessageBody = z.infer<
  typeof TelegramSendMessageBodySchema
>
