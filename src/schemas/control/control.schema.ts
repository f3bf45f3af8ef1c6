import { z } from 'zod'

export const PauseStatusSchema = z.object({
  paused: z.boolean(),
})

export const DisplayLimitSchema = z.object({
  limit: z.number().int().nonnegative(),
})

export const DesktopStateUpdateSchema = z
  .object({
    idle: z.boolean().optional(),
    fullscreen: z.boolean().optional(),
  })
  .refine((state) => state.idle !== undefined || state.fullscreen !== undefined, {
    message: 'At least one of idle or fullscreen is required',
  })

export const DesktopStateResponseSchema = z.object({
  idle: z.boolean(),
  fullscreen: z.boolean(),
  nextWakeUp: z.number().nullable(),
})

export type PauseStatus = z.infer<typeof PauseStatusSchema>
export type DisplayLimit = z.infer<typeof DisplayLimitSchema>
export type DesktopStateResponse = z.infer<typeof DesktopStateResponseSchema>
