import {z} from 'zod';

export const RegionCodeSchema = z.enum(['wnam', 'enam', 'weur', 'eeur', 'apac', 'oc', 'af', 'me']);
export type RegionCode = z.infer<typeof RegionCodeSchema>;

export const DEFAULT_REGION: RegionCode = 'wnam';

export const RegionProfileSchema = z
  .object({
    code: RegionCodeSchema,
    name: z.string().min(1),
    namespace_id: z.string().min(1),
    location_hint: z.string().min(1),
    is_eu: z.boolean()
  })
  .strict();

export type RegionProfile = z.infer<typeof RegionProfileSchema>;

export const TargetDescriptorSchema = z
  .object({
    region: RegionCodeSchema,
    namespace_id: z.string().min(1),
    shard_id: z.number().int().gte(0),
    actor_id: z.string().min(1),
    location_hint: z.string().min(1),
    is_eu: z.boolean()
  })
  .strict();

export type TargetDescriptor = z.infer<typeof TargetDescriptorSchema>;

export const RequestKindSchema = z.enum(['soap', 'http']);
export type RequestKind = z.infer<typeof RequestKindSchema>;

export const RequestLogLevelSchema = z.enum(['info', 'debug']);
export type RequestLogLevel = z.infer<typeof RequestLogLevelSchema>;
