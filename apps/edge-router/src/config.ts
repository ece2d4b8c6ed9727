import {LogLevelSchema, type LogLevel} from '@edge-router/logging';
import {DEFAULT_REGION, RegionCodeSchema, type RegionCode} from '@edge-router/schemas';
import {z} from 'zod';

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().gte(0));

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const INVALID_JSON = Symbol('invalid_json');

const optionalJson = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return INVALID_JSON;
  }
}, z.unknown().optional());

const lowerCased = <T extends z.ZodType>(schema: T) =>
  z.preprocess(value => (typeof value === 'string' ? value.trim().toLowerCase() : value), schema);

// Exhaustive: every region needs an endpoint.
const RegionEndpointsSchema = z.record(RegionCodeSchema, z.url({protocol: /^https?$/u}));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    EDGE_ROUTER_ROLE: lowerCased(z.enum(['edge', 'processor'])).default('edge'),
    EDGE_ROUTER_HOST: z.string().default('0.0.0.0'),
    EDGE_ROUTER_PORT: numberFromEnv.pipe(z.number().lte(65_535)).default(8787),
    EDGE_ROUTER_AUTH_TOKEN: z.string().min(1, 'EDGE_ROUTER_AUTH_TOKEN is required'),
    EDGE_ROUTER_MAX_BODY_BYTES: numberFromEnv.pipe(z.number().gte(1)).default(1024 * 1024),
    EDGE_ROUTER_LOG_LEVEL: lowerCased(LogLevelSchema).default('info'),
    EDGE_ROUTER_LOG_REDACT_EXTRA_KEYS: optionalString,
    EDGE_ROUTER_DISPATCH_MODE: lowerCased(z.enum(['in_process', 'http'])).default('in_process'),
    EDGE_ROUTER_REGION_ENDPOINTS: optionalJson,
    EDGE_ROUTER_PROCESSOR_REGION: lowerCased(RegionCodeSchema).default(DEFAULT_REGION)
  })
  .strict();

export type DispatchConfig = {mode: 'in_process'} | {mode: 'http'; endpoints: Record<RegionCode, string>};

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  role: 'edge' | 'processor';
  host: string;
  port: number;
  authToken: string;
  maxBodyBytes: number;
  logging: {
    level: LogLevel;
    redactExtraKeys: string[];
  };
  dispatch: DispatchConfig;
  processorRegion: RegionCode;
};

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  EDGE_ROUTER_ROLE: env.EDGE_ROUTER_ROLE,
  EDGE_ROUTER_HOST: env.EDGE_ROUTER_HOST,
  EDGE_ROUTER_PORT: env.EDGE_ROUTER_PORT,
  EDGE_ROUTER_AUTH_TOKEN: env.EDGE_ROUTER_AUTH_TOKEN,
  EDGE_ROUTER_MAX_BODY_BYTES: env.EDGE_ROUTER_MAX_BODY_BYTES,
  EDGE_ROUTER_LOG_LEVEL: env.EDGE_ROUTER_LOG_LEVEL,
  EDGE_ROUTER_LOG_REDACT_EXTRA_KEYS: env.EDGE_ROUTER_LOG_REDACT_EXTRA_KEYS,
  EDGE_ROUTER_DISPATCH_MODE: env.EDGE_ROUTER_DISPATCH_MODE,
  EDGE_ROUTER_REGION_ENDPOINTS: env.EDGE_ROUTER_REGION_ENDPOINTS,
  EDGE_ROUTER_PROCESSOR_REGION: env.EDGE_ROUTER_PROCESSOR_REGION
});

const parseCsv = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0);

const parseDispatchConfig = ({
  mode,
  rawEndpoints
}: {
  mode: 'in_process' | 'http';
  rawEndpoints: unknown;
}): DispatchConfig => {
  if (rawEndpoints === INVALID_JSON) {
    throw new Error('EDGE_ROUTER_REGION_ENDPOINTS must be valid JSON');
  }

  if (mode === 'in_process') {
    return {mode};
  }

  if (rawEndpoints === undefined) {
    throw new Error('EDGE_ROUTER_REGION_ENDPOINTS is required when EDGE_ROUTER_DISPATCH_MODE=http');
  }

  const endpoints = RegionEndpointsSchema.safeParse(rawEndpoints);
  if (!endpoints.success) {
    throw new Error(
      `EDGE_ROUTER_REGION_ENDPOINTS must map every region to an http(s) URL: ${endpoints.error.issues
        .map(issue => issue.path.map(String).join('.') || issue.message)
        .join(', ')}`
    );
  }

  return {mode, endpoints: endpoints.data};
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env));

  return {
    nodeEnv: parsed.NODE_ENV,
    role: parsed.EDGE_ROUTER_ROLE,
    host: parsed.EDGE_ROUTER_HOST,
    port: parsed.EDGE_ROUTER_PORT,
    authToken: parsed.EDGE_ROUTER_AUTH_TOKEN,
    maxBodyBytes: parsed.EDGE_ROUTER_MAX_BODY_BYTES,
    logging: {
      level: parsed.EDGE_ROUTER_LOG_LEVEL,
      redactExtraKeys: parseCsv(parsed.EDGE_ROUTER_LOG_REDACT_EXTRA_KEYS)
    },
    dispatch: parseDispatchConfig({
      mode: parsed.EDGE_ROUTER_DISPATCH_MODE,
      rawEndpoints: parsed.EDGE_ROUTER_REGION_ENDPOINTS
    }),
    processorRegion: parsed.EDGE_ROUTER_PROCESSOR_REGION
  };
};
