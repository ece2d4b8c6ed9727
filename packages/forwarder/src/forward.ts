import type {StructuredLogger} from '@edge-router/logging';
import type {OutboundHeaderList, OutboundHttpRequest} from '@edge-router/translator';

import type {FetchLike} from './contracts';
import {err, ok, type ForwarderResult} from './errors';

const COMPONENT = 'forwarder';

const toHeadersObject = (headers: OutboundHeaderList): Headers => {
  const upstreamHeaders = new Headers();
  for (const header of headers) {
    upstreamHeaders.append(header.name, header.value);
  }

  return upstreamHeaders;
};

const describeFetchError = (unknownError: unknown) => {
  if (!(unknownError instanceof Error)) {
    return 'Upstream request failed';
  }

  // undici reports the socket-level reason as the cause of a generic "fetch failed".
  const {cause} = unknownError;
  return cause instanceof Error ? `${unknownError.message}: ${cause.message}` : unknownError.message;
};

// Query strings may carry partner credentials.
const toLoggableUrl = (url: string) => {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
};

/**
 * Sends the translated request exactly once. There is no retry and no abort signal: the
 * caller-supplied `timeoutSeconds` is only recorded in the log. `debugDetail` is added to the
 * debug-level event only.
 */
export const forwardOutboundRequest = async ({
  request,
  fetchImpl,
  logger,
  timeoutSeconds,
  debugDetail = {}
}: {
  request: OutboundHttpRequest;
  fetchImpl?: FetchLike;
  logger: StructuredLogger;
  timeoutSeconds?: number;
  debugDetail?: Record<string, unknown>;
}): Promise<ForwarderResult<Response>> => {
  const requestFetch = fetchImpl ?? globalThis.fetch;
  const startedAt = Date.now();

  logger.info({
    event: 'upstream.request.sent',
    component: COMPONENT,
    message: 'Forwarding request upstream',
    metadata: {
      url: toLoggableUrl(request.url),
      method: request.method,
      ...(timeoutSeconds !== undefined ? {timeout_seconds: timeoutSeconds} : {})
    }
  });
  logger.debug({
    event: 'upstream.request.detail',
    component: COMPONENT,
    metadata: {
      url: request.url,
      header_names: request.headers.map(header => header.name),
      payload_length: request.body?.length ?? 0,
      ...debugDetail
    }
  });

  let response: Response;
  try {
    response = await requestFetch(request.url, {
      method: request.method,
      headers: toHeadersObject(request.headers),
      body: request.body
    });
  } catch (unknownError) {
    const message = describeFetchError(unknownError);
    logger.error({
      event: 'upstream.request.failed',
      component: COMPONENT,
      message,
      reason_code: 'upstream_network_error',
      duration_ms: Date.now() - startedAt
    });
    return err('upstream_network_error', message);
  }

  logger.info({
    event: 'upstream.response.received',
    component: COMPONENT,
    message: 'Upstream responded',
    duration_ms: Date.now() - startedAt,
    metadata: {upstream_status: response.status}
  });

  return ok(response);
};
