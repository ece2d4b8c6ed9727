const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'apikey',
  'api_key',
  'body',
  'envelope'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 8;
const MAX_STRING_LENGTH = 2_048;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
};

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  if (state.extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const truncate = (value: string) =>
  value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...[TRUNCATED]` : value;

const sanitizeInternal = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return truncate(value);
  }

  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      ...(value.stack ? {stack: value.stack} : {})
    };
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeInternal(item, depth + 1, state));
  }

  if (typeof value === 'object') {
    if (state.seen.has(value)) {
      return '[CIRCULAR]';
    }

    state.seen.add(value);
    return Object.fromEntries(
      Object.entries(value).map(([key, entryValue]) => [
        key,
        isSensitiveKey(key, state) ? REDACTED_VALUE : sanitizeInternal(entryValue, depth + 1, state)
      ])
    );
  }

  return Object.prototype.toString.call(value);
};

/**
 * Deep copy of `value` fit for a log line: secrets and payload bodies are replaced by `[REDACTED]`,
 * long strings are cut and cycles are broken.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeInternal(value, 0, {
    seen: new WeakSet<object>(),
    extraSensitiveKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(item => item.length > 0))
  });
