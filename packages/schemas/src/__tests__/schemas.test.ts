import {describe, expect, it} from 'vitest';

import {
  DispatchRequestSchema,
  isLosslessNumber,
  JsonValueSchema,
  LosslessNumber,
  parseJsonLossless,
  readHeader,
  RequestDataSchema,
  SoapRequestDataSchema,
  stringifyJsonLossless
} from '../index';

describe('RequestDataSchema', () => {
  it('fills defaults for a minimal payload', () => {
    expect(RequestDataSchema.parse({url: 'https://upstream.test/get'})).toEqual({
      url: 'https://upstream.test/get',
      method: 'post',
      params: {},
      headers: {},
      timeout: 30
    });
  });

  it('accepts methods in any case', () => {
    expect(RequestDataSchema.parse({url: 'https://upstream.test', method: 'GET'}).method).toBe('get');
    expect(RequestDataSchema.parse({url: 'https://upstream.test', method: 'Patch'}).method).toBe('patch');
  });

  it('rejects unknown methods and missing urls', () => {
    expect(RequestDataSchema.safeParse({url: 'https://upstream.test', method: 'trace'}).success).toBe(false);
    expect(RequestDataSchema.safeParse({method: 'get'}).success).toBe(false);
  });

  it('rejects non-string query params', () => {
    expect(RequestDataSchema.safeParse({url: 'https://upstream.test', params: {page: 2}}).success).toBe(false);
  });
});

describe('SoapRequestDataSchema', () => {
  it('keeps params as ordered key/value pairs of any JSON value', () => {
    const parsed = SoapRequestDataSchema.parse({
      url: 'https://partner.test/soap',
      action: 'getDIDCountry',
      namespace: 'urn:getDIDCountry',
      params: [
        ['format', 'json'],
        ['1', 44],
        ['flags', {a: [true, null]}]
      ]
    });

    expect(parsed.params).toEqual([
      ['format', 'json'],
      ['1', 44],
      ['flags', {a: [true, null]}]
    ]);
    expect(parsed.headers).toEqual({});
    expect(parsed.timeout).toBe(30);
  });

  it('requires action and namespace', () => {
    expect(SoapRequestDataSchema.safeParse({url: 'https://partner.test/soap', action: 'a'}).success).toBe(false);
  });
});

describe('lossless JSON', () => {
  it('keeps the source text of every number', () => {
    const parsed = parseJsonLossless('[44.0,1e21,12345678901234567890,-0.50]');

    expect(Array.isArray(parsed)).toBe(true);
    expect(Array.isArray(parsed) ? parsed.map(item => (isLosslessNumber(item) ? item.value : null)) : []).toEqual([
      '44.0',
      '1e21',
      '12345678901234567890',
      '-0.50'
    ]);
  });

  it('writes numbers back unchanged', () => {
    const text = '{"id":12345678901234567890,"ratio":44.0,"big":1e21,"name":"x"}';

    expect(stringifyJsonLossless(parseJsonLossless(text))).toBe(text);
  });

  it('throws a syntax error on malformed input', () => {
    expect(() => parseJsonLossless('{"url":')).toThrow(SyntaxError);
  });

  it('accepts lossless numbers as JSON values', () => {
    const value = {n: new LosslessNumber('44.0'), list: [new LosslessNumber('1')]};

    expect(JsonValueSchema.parse(value)).toEqual(value);
  });

  it('reads a lossless timeout as a number', () => {
    const parsed = RequestDataSchema.parse(parseJsonLossless('{"url":"https://upstream.test","timeout":45}'));

    expect(parsed.timeout).toBe(45);
  });
});

describe('DispatchRequestSchema', () => {
  it('rejects unknown fields', () => {
    const result = DispatchRequestSchema.safeParse({
      target: {
        region: 'weur',
        namespace_id: 'WEUR_PROCESSOR',
        shard_id: 3,
        actor_id: 'weur-processor-3',
        location_hint: 'weur',
        is_eu: true
      },
      path: '/',
      body: '{}',
      request_kind: 'http',
      log_level: 'info',
      correlation_id: 'corr-1',
      extra: true
    });

    expect(result.success).toBe(false);
  });
});

describe('readHeader', () => {
  it('matches names case-insensitively and takes the first repeated value', () => {
    const headers = {'X-Request-Type': 'soap', 'x-cf-region': ['weur', 'enam'], absent: undefined};

    expect(readHeader(headers, 'x-request-type')).toBe('soap');
    expect(readHeader(headers, 'X-CF-Region')).toBe('weur');
    expect(readHeader(headers, 'absent')).toBeUndefined();
    expect(readHeader(headers, 'missing')).toBeUndefined();
  });
});
