import {z} from 'zod';

import {JsonValueSchema} from './requests';

const StatusCodeSchema = z.number().int().gte(0).lte(65_535);

const ApiSuccessResponseSchema = z
  .object({
    status: StatusCodeSchema,
    headers: z.record(z.string(), z.string()),
    body: JsonValueSchema
  })
  .strict();

const ApiErrorResponseSchema = z
  .object({
    status: StatusCodeSchema,
    message: z.string()
  })
  .strict();

const ApiResponseSchema = z.union([ApiSuccessResponseSchema, ApiErrorResponseSchema]);

export type ApiSuccessResponse = z.infer<typeof ApiSuccessResponseSchema>;
export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
export type ApiResponse = z.infer<typeof ApiResponseSchema>;

export const ErrorEnvelopeSchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    correlation_id: z.string().min(1).optional()
  })
  .strict();

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
