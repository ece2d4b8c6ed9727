import type {HttpMethod, RequestData} from '@edge-router/schemas';

import type {OutboundHttpRequest} from './contracts';
import {err, ok, type TranslatorResult} from './errors';
import {normalizeCallerHeaders, withDefaultHeader} from './headers';

export const DEFAULT_USER_AGENT = 'edge-router/1.0';

const QUERY_PARAM_METHODS = new Set<HttpMethod>(['get', 'head', 'delete']);

export const placesParamsInQuery = (method: HttpMethod) => QUERY_PARAM_METHODS.has(method);

const WIRE_METHODS: Record<HttpMethod, OutboundHttpRequest['method']> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  delete: 'DELETE',
  patch: 'PATCH',
  head: 'HEAD',
  options: 'OPTIONS'
};

const appendQueryParams = (url: URL, params: Record<string, string>) => {
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.append(name, value);
  }

  return url.toString();
};

/**
 * Turns a generic proxy payload into the outbound request.
 *
 * GET, HEAD and DELETE carry `params` in the query string, every other method as a JSON object body.
 * Caller headers win over the defaults.
 */
export const translateProxyRequest = (data: RequestData): TranslatorResult<OutboundHttpRequest> => {
  let url: URL;
  try {
    url = new URL(data.url);
  } catch {
    return err('request_url_invalid', `Invalid request URL: ${data.url}`);
  }

  const callerHeaders = normalizeCallerHeaders(data.headers);
  if (!callerHeaders.ok) {
    return callerHeaders;
  }

  const headers = withDefaultHeader(callerHeaders.value, 'user-agent', DEFAULT_USER_AGENT);
  const method = WIRE_METHODS[data.method];

  if (placesParamsInQuery(data.method)) {
    return ok({
      url: Object.keys(data.params).length > 0 ? appendQueryParams(url, data.params) : data.url,
      method,
      headers
    });
  }

  return ok({
    url: data.url,
    method,
    headers: withDefaultHeader(headers, 'content-type', 'application/json'),
    body: JSON.stringify(data.params)
  });
};
