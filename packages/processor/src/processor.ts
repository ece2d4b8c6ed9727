import {forwardOutboundRequest, reduceUpstreamResponse, type FetchLike} from '@edge-router/forwarder';
import type {StructuredLogger} from '@edge-router/logging';
import {
  parseJsonLossless,
  RequestDataSchema,
  SoapRequestDataSchema,
  type ApiResponse,
  type DispatchRequest,
  type RegionCode,
  type RegionProfile,
  type RequestKind
} from '@edge-router/schemas';
import {
  translateProxyRequest,
  translateSoapRequest,
  type OutboundHttpRequest,
  type TranslatorResult
} from '@edge-router/translator';

import {err, ok, type ProcessorResult} from './errors';
import {createPipelineTracker} from './pipeline';

const COMPONENT = 'processor';

type ParsedIssue = {path: PropertyKey[]; message: string};

const formatIssues = (issues: readonly ParsedIssue[]) =>
  issues
    .map(issue => {
      const path = issue.path.map(String).join('.');
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');

const parseJsonText = (text: string): ProcessorResult<unknown> => {
  try {
    return ok(parseJsonLossless(text));
  } catch (unknownError) {
    return err(
      'request_body_invalid',
      400,
      unknownError instanceof Error ? unknownError.message : 'Body is not valid JSON'
    );
  }
};

type PreparedRequest = {
  outbound: OutboundHttpRequest;
  timeoutSeconds: number;
  params: unknown;
};

const errorPrefixes: Record<RequestKind, {parse: string; process: string}> = {
  soap: {parse: 'Invalid SOAP JSON', process: 'SOAP error'},
  http: {parse: 'Invalid JSON', process: 'Proxy error'}
};

const toPrepared = (
  translated: TranslatorResult<OutboundHttpRequest>,
  timeoutSeconds: number,
  params: unknown
): ProcessorResult<PreparedRequest> => {
  if (!translated.ok) {
    return err('request_translation_failed', 500, translated.error.message);
  }

  return ok({outbound: translated.value, timeoutSeconds, params});
};

const prepareRequest = (kind: RequestKind, body: string): ProcessorResult<PreparedRequest> => {
  const json = parseJsonText(body);
  if (!json.ok) {
    return json;
  }

  if (kind === 'soap') {
    const parsed = SoapRequestDataSchema.safeParse(json.value);
    if (!parsed.success) {
      return err('request_body_invalid', 400, formatIssues(parsed.error.issues));
    }

    return toPrepared(translateSoapRequest(parsed.data), parsed.data.timeout, parsed.data.params);
  }

  const parsed = RequestDataSchema.safeParse(json.value);
  if (!parsed.success) {
    return err('request_body_invalid', 400, formatIssues(parsed.error.issues));
  }

  return toPrepared(translateProxyRequest(parsed.data), parsed.data.timeout, parsed.data.params);
};

const withPrefix = <T>(result: ProcessorResult<T>, kind: RequestKind): ProcessorResult<T> => {
  if (result.ok) {
    return result;
  }

  const prefixes = errorPrefixes[kind];
  const prefix = result.error.code === 'request_body_invalid' ? prefixes.parse : prefixes.process;
  return err(result.error.code, result.error.status, `${prefix}: ${result.error.message}`);
};

export type RegionalProcessorOptions = {
  logger: StructuredLogger;
  fetchImpl?: FetchLike;
};

/**
 * The region-pinned half of the pipeline: translate, forward once, reduce.
 * One instance serves every shard of its region; it holds no per-request state.
 */
export class RegionalProcessor {
  constructor(
    readonly profile: RegionProfile,
    private readonly options: RegionalProcessorOptions
  ) {}

  get region(): RegionCode {
    return this.profile.code;
  }

  async handle(request: DispatchRequest): Promise<ProcessorResult<ApiResponse>> {
    const {logger, fetchImpl} = this.options;

    logger.info({
      event: 'processor.request.received',
      component: COMPONENT,
      message: 'Regional processor accepted request',
      region: request.target.region,
      actor_id: request.target.actor_id,
      metadata: {
        shard_id: request.target.shard_id,
        request_kind: request.request_kind,
        location_hint: request.target.location_hint
      }
    });

    if (request.target.region !== this.profile.code) {
      return err(
        'target_region_mismatch',
        421,
        `Target region ${request.target.region} is not served by the ${this.profile.code} processor`
      );
    }

    const tracker = createPipelineTracker({logger, component: COMPONENT});
    const kind = request.request_kind;

    tracker.advance('translating');
    const prepared = withPrefix(prepareRequest(kind, request.body), kind);
    if (!prepared.ok) {
      return prepared;
    }

    tracker.advance('forwarding');
    const forwarded = await forwardOutboundRequest({
      request: prepared.value.outbound,
      fetchImpl,
      logger,
      timeoutSeconds: prepared.value.timeoutSeconds,
      debugDetail: {params: prepared.value.params}
    });
    if (!forwarded.ok) {
      return withPrefix(err('upstream_request_failed', 500, forwarded.error.message), kind);
    }

    tracker.advance('reducing');
    const reduced = await reduceUpstreamResponse({response: forwarded.value});
    if (!reduced.ok) {
      return withPrefix(err('upstream_request_failed', 500, reduced.error.message), kind);
    }

    tracker.advance('done');
    return ok(reduced.value);
  }
}
