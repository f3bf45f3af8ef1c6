import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    queues: z.enum(['ok', 'failed']),
    driver: z.enum(['running', 'stopped']),
  }),
  queues: z
    .object({
      waiting: z.number(),
      displayed: z.number(),
      history: z.number(),
    })
    .nullable(),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
