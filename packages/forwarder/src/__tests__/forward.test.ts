import {createNoopLogger, createStructuredLogger} from '@edge-router/logging';
import type {OutboundHttpRequest} from '@edge-router/translator';
import {describe, expect, it, vi} from 'vitest';

import {forwardOutboundRequest, type FetchLike} from '../index';

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

const outboundRequest: OutboundHttpRequest = {
  url: 'https://upstream.test/post?key=test-secret',
  method: 'POST',
  headers: [
    {name: 'user-agent', value: 'edge-router/1.0'},
    {name: 'content-type', value: 'application/json'}
  ],
  body: '{"q":"x"}'
};

describe('forwardOutboundRequest', () => {
  it('sends one request with the translated method, headers and body', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('ok', {status: 200}));

    const forwarded = await forwardOutboundRequest({
      request: outboundRequest,
      fetchImpl,
      logger: createNoopLogger()
    });

    expect(forwarded.ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://upstream.test/post?key=test-secret');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"q":"x"}');
    expect(init?.signal).toBeUndefined();

    const headers = new Headers(init?.headers);
    expect(headers.get('user-agent')).toBe('edge-router/1.0');
    expect(headers.get('content-type')).toBe('application/json');
  });

  it('returns non-2xx responses as they are', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('missing', {status: 404}));

    const forwarded = await forwardOutboundRequest({
      request: {url: 'https://upstream.test/get', method: 'GET', headers: []},
      fetchImpl,
      logger: createNoopLogger()
    });

    expect(forwarded.ok && forwarded.value.status).toBe(404);
  });

  it('maps a thrown fetch error to a network failure without retrying', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed', {cause: new Error('connect ECONNREFUSED 127.0.0.1:9')});
    });

    const forwarded = await forwardOutboundRequest({
      request: outboundRequest,
      fetchImpl,
      logger: createNoopLogger()
    });

    expect(forwarded).toEqual({
      ok: false,
      error: {code: 'upstream_network_error', message: 'fetch failed: connect ECONNREFUSED 127.0.0.1:9'}
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('logs the send without the query string and the failure at error level', async () => {
    const {lines, logger} = createCapturingLogger();
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new Error('socket hang up');
    });

    await forwardOutboundRequest({request: outboundRequest, fetchImpl, logger, timeoutSeconds: 30});

    expect(lines.map(line => line.event)).toEqual(['upstream.request.sent', 'upstream.request.failed']);
    expect(lines[0]?.metadata).toEqual({
      url: 'https://upstream.test/post',
      method: 'POST',
      timeout_seconds: 30
    });
    expect(lines[1]?.level).toBe('error');
    expect(lines[1]?.reason_code).toBe('upstream_network_error');
  });
});
