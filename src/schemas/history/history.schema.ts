import { z } from 'zod'

export const HistoryPopResponseSchema = z.object({
  id: z.number().nullable(),
  restored: z.boolean(),
})

export const HistoryPushAllResponseSchema = z.object({
  closed: z.number(),
})

export type HistoryPopResponse = z.infer<typeof HistoryPopResponseSchema>
export type HistoryPushAllResponse = z.infer<
  typeof HistoryPushAllResponseSchema
>
