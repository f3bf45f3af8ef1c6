import { MAX_NOTIFICATION_ID } from '@root/types/notification.types.js'
import { z } from 'zod'

export const UrgencySchema = z.enum(['low', 'normal', 'critical'])

export const FullscreenBehaviorSchema = z.enum(['show', 'delay', 'pushback'])

export const CloseReasonSchema = z.enum([
  'timeout',
  'dismissed-by-user',
  'closed-by-signal',
  'replaced',
  'undefined',
])

export const NotificationIdParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_NOTIFICATION_ID),
})

// Notification as submitted by a client
export const NotificationInputSchema = z.object({
  id: z.number().int().nonnegative().max(MAX_NOTIFICATION_ID).optional(),
  appName: z.string().min(1, 'appName is required'),
  summary: z.string(),
  body: z.string().optional(),
  icon: z.string().optional(),
  category: z.string().optional(),
  urgency: UrgencySchema.optional(),
  timeout: z.number().int().min(-1).optional(),
  transient: z.boolean().optional(),
  stackTag: z.string().min(1).nullable().optional(),
  progress: z.number().int().min(0).max(100).nullable().optional(),
  fullscreen: FullscreenBehaviorSchema.optional(),
  historyIgnore: z.boolean().optional(),
})

// Replacement keeps the id in the path
export const NotificationReplaceBodySchema = NotificationInputSchema.omit({
  id: true,
})

export const NotificationSchema = z.object({
  id: z.number(),
  appName: z.string(),
  summary: z.string(),
  body: z.string(),
  icon: z.string(),
  category: z.string(),
  urgency: UrgencySchema,
  timeout: z.number(),
  transient: z.boolean(),
  stackTag: z.string().nullable(),
  progress: z.number().nullable(),
  fullscreen: FullscreenBehaviorSchema,
  historyIgnore: z.boolean(),
  timestamp: z.number(),
  start: z.number(),
  dupCount: z.number(),
  redisplayed: z.boolean(),
  closeReason: CloseReasonSchema.nullable(),
})

export const NotificationListSchema = z.array(NotificationSchema)

export const InsertResponseSchema = z.object({
  id: z.number(),
  dismissed: z.boolean(),
})

export const CloseQuerySchema = z.object({
  reason: CloseReasonSchema.default('closed-by-signal'),
})

export const QueueCountsSchema = z.object({
  waiting: z.number(),
  displayed: z.number(),
  history: z.number(),
  paused: z.boolean(),
  displayLimit: z.number(),
})

export const ClosedSignalSchema = z.object({
  id: z.number(),
  reason: CloseReasonSchema,
  code: z.number(),
  notification: NotificationSchema,
})

export type NotificationInputBody = z.infer<typeof NotificationInputSchema>
export type InsertResponse = z.infer<typeof InsertResponseSchema>
export type QueueCounts = z.infer<typeof QueueCountsSchema>
