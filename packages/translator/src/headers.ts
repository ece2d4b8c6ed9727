import type {OutboundHeaderList} from './contracts';
import {err, ok, type TranslatorResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;
// Horizontal tab plus visible ASCII and space; anything else cannot be written on the wire.
const HTTP_HEADER_VALUE_REGEX = /^[\t\x20-\x7e]*$/u;

export const normalizeHeaderName = (name: string): TranslatorResult<string> => {
  if (!HTTP_HEADER_NAME_REGEX.test(name)) {
    return err('invalid_header_name', `Invalid header name: ${name}`);
  }

  return ok(name.toLowerCase());
};

export const validateHeaderValue = (value: string): TranslatorResult<string> => {
  if (!HTTP_HEADER_VALUE_REGEX.test(value)) {
    return err('invalid_header_value', `Invalid header value: ${value}`);
  }

  return ok(value);
};

const upsertHeader = (headers: OutboundHeaderList, name: string, value: string): OutboundHeaderList => [
  ...headers.filter(header => header.name !== name),
  {name, value}
];

export const hasHeader = (headers: OutboundHeaderList, name: string) =>
  headers.some(header => header.name === name.toLowerCase());

/**
 * Validates caller-supplied headers and lower-cases their names. A later duplicate (for example
 * `Accept` after `accept`) replaces the earlier one.
 */
export const normalizeCallerHeaders = (headers: Record<string, string>): TranslatorResult<OutboundHeaderList> => {
  let normalized: OutboundHeaderList = [];

  for (const [rawName, rawValue] of Object.entries(headers)) {
    const name = normalizeHeaderName(rawName);
    if (!name.ok) {
      return name;
    }

    const value = validateHeaderValue(rawValue);
    if (!value.ok) {
      return value;
    }

    normalized = upsertHeader(normalized, name.value, value.value);
  }

  return ok(normalized);
};

export const withDefaultHeader = (headers: OutboundHeaderList, name: string, value: string): OutboundHeaderList =>
  hasHeader(headers, name) ? headers : [...headers, {name, value}];

export const withFixedHeaders = (
  headers: OutboundHeaderList,
  fixedHeaders: OutboundHeaderList
): OutboundHeaderList =>
  fixedHeaders.reduce((merged, header) => upsertHeader(merged, header.name, header.value), headers);
