import {createStructuredLogger} from '@edge-router/logging';
import {describe, expect, it} from 'vitest';

import {ALL_REGION_CODES, classifyRequest, resolveLogLevel, resolveRegion, resolveRequestKind} from '../index';

const createCapturingLogger = () => {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write: (chunk: string | Uint8Array) => {
      lines.push(JSON.parse(String(chunk)) as Record<string, unknown>);
      return true;
    }
  };

  return {
    lines,
    logger: createStructuredLogger({
      service: 'edge-router',
      env: 'test',
      level: 'info',
      writer: {stdout: stream, stderr: stream}
    })
  };
};

describe('resolveRegion', () => {
  it.each(ALL_REGION_CODES.map(code => [code]))('maps %s in any letter case', code => {
    expect(resolveRegion({value: code})).toBe(code);
    expect(resolveRegion({value: code.toUpperCase()})).toBe(code);
  });

  it('maps mixed case values', () => {
    expect(resolveRegion({value: 'WeUr'})).toBe('weur');
    expect(resolveRegion({value: 'Oc'})).toBe('oc');
  });

  it.each([['eu'], [''], ['weur1'], ['north-america'], ['APAC,ME']])('defaults %j to wnam', value => {
    expect(resolveRegion({value})).toBe('wnam');
  });

  it('defaults an absent header to wnam without logging', () => {
    const {lines, logger} = createCapturingLogger();

    expect(resolveRegion({value: undefined, logger})).toBe('wnam');
    expect(lines).toHaveLength(0);
  });

  it('logs the fallback for an unknown region', () => {
    const {lines, logger} = createCapturingLogger();

    resolveRegion({value: 'mars', logger});

    expect(lines).toHaveLength(1);
    expect(lines[0]?.event).toBe('routing.region.defaulted');
    expect(lines[0]?.reason_code).toBe('region_unknown');
    expect(lines[0]?.metadata).toEqual({requested_region: 'mars'});
  });
});

describe('resolveRequestKind', () => {
  it('treats only the soap marker as SOAP', () => {
    expect(resolveRequestKind('soap')).toBe('soap');
    expect(resolveRequestKind('SOAP')).toBe('soap');
    expect(resolveRequestKind('http')).toBe('http');
    expect(resolveRequestKind('soap-1.2')).toBe('http');
    expect(resolveRequestKind(undefined)).toBe('http');
  });
});

describe('resolveLogLevel', () => {
  it('enables debug only for the debug value', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('info')).toBe('info');
    expect(resolveLogLevel('trace')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});

describe('classifyRequest', () => {
  it('reads all three routing headers case-insensitively', () => {
    expect(
      classifyRequest({
        headers: {
          'X-CF-Region': 'EEUR',
          'X-Request-Type': 'soap',
          'X-Log-Level': 'debug'
        }
      })
    ).toEqual({region: 'eeur', requestKind: 'soap', logLevel: 'debug'});
  });

  it('falls back to defaults when no routing header is present', () => {
    expect(classifyRequest({headers: {'content-type': 'application/json'}})).toEqual({
      region: 'wnam',
      requestKind: 'http',
      logLevel: 'info'
    });
  });
});
