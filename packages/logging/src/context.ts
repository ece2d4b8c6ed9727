import {AsyncLocalStorage} from 'node:async_hooks';

import {RegionCodeSchema, RequestLogLevelSchema} from '@edge-router/schemas';
import {z} from 'zod';

const boundedId = z.string().min(1).max(128);

/**
 * Fields stamped on every log line written while a request is in flight. `region` and
 * `actor_id` are filled in once routing has picked a target.
 */
export const LogContextSchema = z
  .object({
    correlation_id: boundedId.optional(),
    request_id: boundedId.optional(),
    region: RegionCodeSchema.optional(),
    actor_id: z.string().min(1).optional(),
    log_level: RequestLogLevelSchema.optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  storage.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => storage.getStore();

/**
 * Merges fields into the active context. Outside a request this is a no-op.
 */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const current = storage.getStore();
  if (current === undefined) {
    return undefined;
  }

  return Object.assign(current, LogContextSchema.partial().parse(fields));
};
