import {randomUUID} from 'node:crypto';
import type {IncomingMessage, ServerResponse} from 'node:http';

import {ErrorEnvelopeSchema, type DispatchResponse} from '@edge-router/schemas';

import {badRequest} from './errors';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'cache-control': 'no-store'
};

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers[CORRELATION_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (typeof value !== 'string') {
    return randomUUID();
  }

  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID();
  }

  return trimmed;
};

/**
 * Reads the whole request body, failing as soon as it grows past `maxBodyBytes`.
 */
export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage;
  maxBodyBytes: number;
}) => {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of request) {
    let bufferChunk: Buffer;
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8');
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk);
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type');
    }

    size += bufferChunk.length;
    if (size > maxBodyBytes) {
      throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`);
    }

    chunks.push(bufferChunk);
  }

  return Buffer.concat(chunks);
};

const writeBody = ({
  response,
  status,
  correlationId,
  contentType,
  body
}: {
  response: ServerResponse;
  status: number;
  correlationId: string;
  contentType: string;
  body: Buffer;
}) => {
  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': contentType,
    'content-length': String(body.length),
    [CORRELATION_ID_HEADER]: correlationId
  });

  response.end(body);
};

export const sendJson = ({
  response,
  status,
  correlationId,
  payload
}: {
  response: ServerResponse;
  status: number;
  correlationId: string;
  payload: unknown;
}) =>
  writeBody({
    response,
    status,
    correlationId,
    contentType: 'application/json; charset=utf-8',
    body: Buffer.from(JSON.stringify(payload), 'utf8')
  });

export const sendText = ({
  response,
  status,
  correlationId,
  text
}: {
  response: ServerResponse;
  status: number;
  correlationId: string;
  text: string;
}) =>
  writeBody({
    response,
    status,
    correlationId,
    contentType: 'text/plain; charset=utf-8',
    body: Buffer.from(text, 'utf8')
  });

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse;
  status: number;
  error: string;
  message: string;
  correlationId: string;
}) => {
  const payload = ErrorEnvelopeSchema.parse({
    error,
    message,
    correlation_id: correlationId
  });

  sendJson({response, status, payload, correlationId});
};

/**
 * Relays a regional processor's answer. Only its content type is kept; framing and security
 * headers are ours.
 */
export const sendDispatchResponse = ({
  response,
  dispatched,
  correlationId
}: {
  response: ServerResponse;
  dispatched: DispatchResponse;
  correlationId: string;
}) => {
  const contentType = Object.entries(dispatched.headers).find(([name]) => name.toLowerCase() === 'content-type');

  writeBody({
    response,
    status: dispatched.status,
    correlationId,
    contentType: contentType?.[1] ?? 'application/json; charset=utf-8',
    body: Buffer.from(dispatched.body, 'utf8')
  });
};
