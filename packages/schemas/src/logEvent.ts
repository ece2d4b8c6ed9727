import {z} from 'zod';

export const LogEventSchema = z
  .object({
    ts: z.string().min(1),
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    correlation_id: z.string().min(1),
    request_id: z.string().min(1),
    message: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    actor_id: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;
