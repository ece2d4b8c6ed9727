import {z} from 'zod';

import {isLosslessNumber, LosslessNumber} from './json';

export const httpMethods = ['get', 'post', 'put', 'delete', 'patch', 'head', 'options'] as const;

export const HttpMethodSchema = z
  .string()
  .transform(value => value.toLowerCase())
  .pipe(z.enum(httpMethods));

export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | {[key: string]: JsonValue};

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.instanceof(LosslessNumber),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema)
  ])
);

const HeaderMapSchema = z.record(z.string(), z.string());

// Advisory only: nothing in the pipeline enforces it.
const TimeoutSecondsSchema = z
  .preprocess(value => (isLosslessNumber(value) ? Number(value.value) : value), z.number().int().gte(0))
  .default(30);

export const RequestDataSchema = z.object({
  url: z.string(),
  method: HttpMethodSchema.default('post'),
  params: z.record(z.string(), z.string()).default({}),
  headers: HeaderMapSchema.default({}),
  timeout: TimeoutSecondsSchema
});

export type RequestData = z.infer<typeof RequestDataSchema>;

export const SoapParamSchema = z.tuple([z.string(), JsonValueSchema]);
export type SoapParam = z.infer<typeof SoapParamSchema>;

export const SoapRequestDataSchema = z.object({
  url: z.string(),
  action: z.string(),
  namespace: z.string(),
  params: z.array(SoapParamSchema).default([]),
  headers: HeaderMapSchema.default({}),
  timeout: TimeoutSecondsSchema
});

export type SoapRequestData = z.infer<typeof SoapRequestDataSchema>;
