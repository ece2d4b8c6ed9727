import {STATUS_CODES} from 'node:http';

import {JsonValueSchema, parseJsonLossless, type ApiResponse, type JsonValue} from '@edge-router/schemas';

import {err, ok, type ForwarderResult} from './errors';

export const UNKNOWN_STATUS_REASON = 'Unknown Status';

export const reasonPhraseFor = (status: number) => STATUS_CODES[status] ?? UNKNOWN_STATUS_REASON;

export const isSuccessStatus = (status: number) => status >= 200 && status <= 299;

export const collectResponseHeaders = (headers: Headers) => {
  const collected: Record<string, string> = {};
  headers.forEach((value, name) => {
    collected[name] = value;
  });

  return collected;
};

// Numbers keep their source text.
const parseBody = (text: string): JsonValue => {
  let parsed: unknown;
  try {
    parsed = parseJsonLossless(text);
  } catch {
    return text;
  }

  const json = JsonValueSchema.safeParse(parsed);
  return json.success ? json.data : text;
};

/**
 * Collapses an upstream response into the caller-facing shape. A 2xx keeps headers and body;
 * anything else keeps only the status and its reason phrase, and its body is discarded unread.
 */
export const reduceUpstreamResponse = async ({
  response
}: {
  response: Response;
}): Promise<ForwarderResult<ApiResponse>> => {
  if (!isSuccessStatus(response.status)) {
    await response.body?.cancel();
    return ok({status: response.status, message: reasonPhraseFor(response.status)});
  }

  let text: string;
  try {
    text = await response.text();
  } catch (unknownError) {
    return err(
      'upstream_body_unreadable',
      unknownError instanceof Error ? unknownError.message : 'Failed while reading upstream response body'
    );
  }

  return ok({
    status: response.status,
    headers: collectResponseHeaders(response.headers),
    body: parseBody(text)
  });
};
