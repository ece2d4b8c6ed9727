import {z} from 'zod';

import {RequestKindSchema, RequestLogLevelSchema, TargetDescriptorSchema} from './regions';

export const DispatchRequestSchema = z
  .object({
    target: TargetDescriptorSchema,
    path: z.string().min(1),
    body: z.string(),
    request_kind: RequestKindSchema,
    log_level: RequestLogLevelSchema,
    correlation_id: z.string().min(1).max(128)
  })
  .strict();

export type DispatchRequest = z.infer<typeof DispatchRequestSchema>;

export const DispatchResponseSchema = z
  .object({
    status: z.number().int().gte(100).lte(599),
    headers: z.record(z.string(), z.string()),
    body: z.string()
  })
  .strict();

export type DispatchResponse = z.infer<typeof DispatchResponseSchema>;

export const PipelineStageSchema = z.enum([
  'authenticating',
  'classifying',
  'routing',
  'translating',
  'forwarding',
  'reducing',
  'done'
]);

export type PipelineStage = z.infer<typeof PipelineStageSchema>;
