import { z } from 'zod'

// Any JSON object; arrays and null are rejected
export const JsonObjectSchema = z
  .record(z.string(), z.unknown())
  .refine((value) => !Array.isArray(value))

export const HomeworksResponseSchema = z.object({
  current_date: z.number().int(),
  homeworks: z.array(z.unknown()),
})

export const HOMEWORKS_RESPONSE_KEYS = ['current_date', 'homeworks'] as const

export type JsonObject = z.infer<typeof JsonObjectSchema>
