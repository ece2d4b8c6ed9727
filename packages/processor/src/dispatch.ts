import {collectResponseHeaders, type FetchLike} from '@edge-router/forwarder';
import type {StructuredLogger} from '@edge-router/logging';
import {ALL_REGION_CODES, buildActorId, getRegionProfile, parseRegionCode, SHARD_COUNT} from '@edge-router/routing';
import {
  readHeader,
  stringifyJsonLossless,
  TargetDescriptorSchema,
  type ApiResponse,
  type DispatchRequest,
  type DispatchResponse,
  type InboundHeaders,
  type RegionCode,
  type TargetDescriptor
} from '@edge-router/schemas';

import {err, ok, type ProcessorResult} from './errors';
import {RegionalProcessor} from './processor';

const COMPONENT = 'dispatch';
const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export const DISPATCH_HEADERS = {
  namespace: 'x-target-namespace',
  shard: 'x-target-shard',
  actor: 'x-target-actor',
  locationHint: 'x-location-hint'
} as const;

/**
 * Where the edge hands a routed request. Implementations carry the request to the processor
 * named by `request.target` and return its raw answer.
 */
export interface RegionalDispatchTarget {
  send(request: DispatchRequest): Promise<DispatchResponse>;
}

export class RegionEndpointMissingError extends Error {
  constructor(readonly region: RegionCode) {
    super(`No processor endpoint configured for region ${region}`);
    this.name = 'RegionEndpointMissingError';
  }
}

/**
 * Renders a processor outcome as the processor's HTTP answer: 200 with the `ApiResponse`, or the
 * failure status with an `{error, message, correlation_id}` body. Upstream numbers are written
 * with their source text.
 */
export const toDispatchResponse = (
  result: ProcessorResult<ApiResponse>,
  correlationId: string
): DispatchResponse => {
  if (result.ok) {
    return {
      status: 200,
      headers: {'content-type': JSON_CONTENT_TYPE},
      body: stringifyJsonLossless(result.value)
    };
  }

  return {
    status: result.error.status,
    headers: {'content-type': JSON_CONTENT_TYPE},
    body: JSON.stringify({error: result.error.code, message: result.error.message, correlation_id: correlationId})
  };
};

export const createInProcessDispatchTarget = ({
  fetchImpl,
  logger
}: {
  fetchImpl?: FetchLike;
  logger: StructuredLogger;
}): RegionalDispatchTarget => {
  const processors = new Map(
    ALL_REGION_CODES.map(code => [code, new RegionalProcessor(getRegionProfile(code), {fetchImpl, logger})])
  );

  return {
    send: async request => {
      const processor = processors.get(request.target.region);
      if (!processor) {
        throw new RegionEndpointMissingError(request.target.region);
      }

      return toDispatchResponse(await processor.handle(request), request.correlation_id);
    }
  };
};

export type RegionEndpoints = Partial<Record<RegionCode, string>>;

const joinUrl = (endpoint: string, path: string) =>
  `${endpoint.replace(/\/+$/u, '')}${path.startsWith('/') ? path : `/${path}`}`;

export const toDispatchHeaders = ({
  request,
  authToken
}: {
  request: DispatchRequest;
  authToken: string;
}): Record<string, string> => ({
  'content-type': 'application/json',
  ...(request.request_kind === 'soap' ? {'x-request-type': 'soap'} : {}),
  'x-log-level': request.log_level,
  authorization: `Bearer ${authToken}`,
  'x-correlation-id': request.correlation_id,
  [DISPATCH_HEADERS.namespace]: request.target.namespace_id,
  [DISPATCH_HEADERS.shard]: String(request.target.shard_id),
  [DISPATCH_HEADERS.actor]: request.target.actor_id,
  [DISPATCH_HEADERS.locationHint]: request.target.location_hint
});

/**
 * Rebuilds the target descriptor from the addressing headers on the processor side. The location
 * hint is the region code; the rest must agree with the region table.
 */
export const parseDispatchTarget = (headers: InboundHeaders): ProcessorResult<TargetDescriptor> => {
  const hint = readHeader(headers, DISPATCH_HEADERS.locationHint);
  const region = hint === undefined ? null : parseRegionCode(hint);
  if (!region) {
    return err('dispatch_target_invalid', 400, `Missing or unknown ${DISPATCH_HEADERS.locationHint} header`);
  }

  const profile = getRegionProfile(region);
  const shard = readHeader(headers, DISPATCH_HEADERS.shard);
  const parsed = TargetDescriptorSchema.safeParse({
    region,
    namespace_id: readHeader(headers, DISPATCH_HEADERS.namespace),
    shard_id: shard !== undefined && /^\d+$/u.test(shard) ? Number(shard) : undefined,
    actor_id: readHeader(headers, DISPATCH_HEADERS.actor),
    location_hint: profile.location_hint,
    is_eu: profile.is_eu
  });
  if (!parsed.success) {
    return err('dispatch_target_invalid', 400, 'Dispatch addressing headers are incomplete');
  }

  if (parsed.data.namespace_id !== profile.namespace_id) {
    return err(
      'dispatch_target_invalid',
      400,
      `Namespace ${parsed.data.namespace_id} does not belong to region ${region}`
    );
  }

  const {shard_id: shardId, actor_id: actorId} = parsed.data;
  if (shardId >= SHARD_COUNT) {
    return err('dispatch_target_invalid', 400, `Shard ${shardId} is outside 0-${SHARD_COUNT - 1}`);
  }

  const expectedActorId = buildActorId(region, shardId);
  if (actorId !== expectedActorId) {
    return err('dispatch_target_invalid', 400, `Actor ${actorId} does not match ${expectedActorId}`);
  }

  return ok(parsed.data);
};

/**
 * Sends routed requests to processors running in their own region. Each region, EU ones
 * included, resolves only to the endpoint declared for it.
 */
export const createHttpDispatchTarget = ({
  endpoints,
  authToken,
  fetchImpl,
  logger
}: {
  endpoints: RegionEndpoints;
  authToken: string;
  fetchImpl?: FetchLike;
  logger: StructuredLogger;
}): RegionalDispatchTarget => {
  const requestFetch = fetchImpl ?? globalThis.fetch;

  return {
    send: async request => {
      const endpoint = endpoints[request.target.region];
      if (!endpoint) {
        throw new RegionEndpointMissingError(request.target.region);
      }

      const url = joinUrl(endpoint, request.path);
      logger.debug({
        event: 'dispatch.request.sent',
        component: COMPONENT,
        message: 'Dispatching to regional processor',
        actor_id: request.target.actor_id,
        metadata: {endpoint: url, location_hint: request.target.location_hint}
      });

      const response = await requestFetch(url, {
        method: 'POST',
        headers: toDispatchHeaders({request, authToken}),
        body: request.body
      });

      return {
        status: response.status,
        headers: collectResponseHeaders(response.headers),
        body: await response.text()
      };
    }
  };
};
