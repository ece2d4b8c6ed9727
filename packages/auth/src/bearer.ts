import {createHash, timingSafeEqual} from 'node:crypto';

import {readHeader, type InboundHeaders} from '@edge-router/schemas';

const BEARER_PREFIX = 'Bearer ';

export const FORBIDDEN_MESSAGE = 'Forbidden: Invalid or missing authentication token';

export const authFailureCodes = ['authorization_missing', 'authorization_scheme_invalid', 'token_mismatch'] as const;

export type AuthFailureCode = (typeof authFailureCodes)[number];

export type AuthResult = {ok: true} | {ok: false; error: AuthFailureCode};

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest();

/**
 * Exact string equality without an early exit on the first differing byte.
 */
export const tokensMatch = (presented: string, expected: string) =>
  timingSafeEqual(digest(presented), digest(expected));

/**
 * Checks `Authorization: Bearer <token>` against the configured secret.
 *
 * The failure code is for internal logs only. Callers must answer every failure with the same
 * response so the reason never reaches the client.
 */
export const validateBearerToken = ({
  headers,
  expectedSecret
}: {
  headers: InboundHeaders;
  expectedSecret: string;
}): AuthResult => {
  const authorization = readHeader(headers, 'authorization');
  if (authorization === undefined) {
    return {ok: false, error: 'authorization_missing'};
  }

  if (!authorization.startsWith(BEARER_PREFIX)) {
    return {ok: false, error: 'authorization_scheme_invalid'};
  }

  const token = authorization.slice(BEARER_PREFIX.length);
  if (expectedSecret.length === 0 || !tokensMatch(token, expectedSecret)) {
    return {ok: false, error: 'token_mismatch'};
  }

  return {ok: true};
};
