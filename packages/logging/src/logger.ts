import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@edge-router/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EmittableLogLevel = LogEvent['level'];

const LEVEL_RANK = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
} as const satisfies Record<LogLevel, number>;

/**
 * What callers pass: the envelope minus the fields the logger stamps itself. Request-scoped
 * fields are optional here and fall back to the active log context.
 */
export const LogEventInputSchema = LogEventSchema.omit({ts: true, service: true, env: true}).partial({
  correlation_id: true,
  request_id: true,
  metadata: true
});

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const CONTEXT_FIELDS = ['correlation_id', 'request_id', 'region', 'actor_id', 'route', 'method'] as const;
type ContextField = (typeof CONTEXT_FIELDS)[number];

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
};

/**
 * A request that asked for `X-Log-Level: debug` lowers the threshold to debug for its own events.
 * A silent logger stays silent.
 */
const thresholdFor = (configuredLevel: LogLevel, context: LogContext | undefined): number =>
  configuredLevel !== 'silent' && context?.log_level === 'debug' ? LEVEL_RANK.debug : LEVEL_RANK[configuredLevel];

const resolveContextFields = (input: LogEventInput, context: LogContext | undefined) => {
  const fields: Partial<Record<ContextField, string>> = {};
  for (const field of CONTEXT_FIELDS) {
    const value = input[field] ?? context?.[field];
    if (value !== undefined) {
      fields[field] = value;
    }
  }

  return fields;
};

const toMetadataRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? {...value} : {};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const level = LogLevelSchema.parse(options.level);
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const now = options.now ?? (() => new Date());
  const writer = options.writer ?? {stdout: process.stdout, stderr: process.stderr};
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const toEnvelope = (input: LogEventInput, context: LogContext | undefined): LogEvent =>
    LogEventSchema.parse({
      ts: now().toISOString(),
      level: input.level,
      service,
      env,
      event: input.event,
      component: input.component,
      correlation_id: 'n/a',
      request_id: 'n/a',
      ...resolveContextFields(input, context),
      message: input.message,
      reason_code: input.reason_code,
      duration_ms: input.duration_ms,
      status_code: input.status_code,
      metadata: toMetadataRecord(sanitizeForLog({value: input.metadata ?? {}, extraSensitiveKeys}))
    });

  const streamFor = (eventLevel: EmittableLogLevel) =>
    eventLevel === 'error' || eventLevel === 'fatal' ? writer.stderr : writer.stdout;

  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      const context = getLogContext();
      if (LEVEL_RANK[input.level] < thresholdFor(level, context)) {
        return;
      }

      streamFor(input.level).write(`${JSON.stringify(toEnvelope(input, context))}\n`);
    } catch {
      // Logging never throws into request handling.
    }
  };

  const at =
    (eventLevel: EmittableLogLevel): LevelMethod =>
    input =>
      log({...input, level: eventLevel});

  return {
    log,
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    fatal: at('fatal')
  };
};

export const createNoopLogger = (): StructuredLogger => {
  const ignore = () => undefined;
  return {log: ignore, debug: ignore, info: ignore, warn: ignore, error: ignore, fatal: ignore};
};
