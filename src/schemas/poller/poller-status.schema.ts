import { z } from 'zod'

export const CycleOutcomeSchema = z.enum([
  'ok',
  'transport',
  'status-code',
  'decode',
  'shape',
  'missing-key',
  'empty-result',
  'empty-status',
  'unknown-verdict',
  'unclassified',
])

export const PollerStatusResponseSchema = z.object({
  state: z.enum(['running', 'stopped']),
  cursor: z.number().int(),
  lastMessage: z.string(),
  cycles: z.number().int(),
  retryPeriodSeconds: z.number(),
  lastCycle: z
    .object({
      time: z.string(),
      outcome: CycleOutcomeSchema,
      error: z.string().optional(),
    })
    .nullable(),
})

export const pollerStatusSchema = {
  summary: 'Get poller status',
  operationId: 'getPollerStatus',
  description:
    'Returns the cursor, the last message sent to the chat and the outcome of the most recent poll cycle.',
  response: {
    200: PollerStatusResponseSchema,
  },
  tags: ['Poller'],
}

export type PollerStatusResponse = z.infer<typeof PollerStatusResponseSchema>
