import {randomUUID} from 'node:crypto';
import type {IncomingMessage, ServerResponse} from 'node:http';

import {FORBIDDEN_MESSAGE, validateBearerToken} from '@edge-router/auth';
import type {FetchLike} from '@edge-router/forwarder';
import {
  createNoopLogger,
  runWithLogContext,
  setLogContextFields,
  type StructuredLogger
} from '@edge-router/logging';
import {
  createHttpDispatchTarget,
  createInProcessDispatchTarget,
  createPipelineTracker,
  parseDispatchTarget,
  RegionalProcessor,
  toDispatchResponse,
  type RegionalDispatchTarget
} from '@edge-router/processor';
import {
  classifyRequest,
  getRegionProfile,
  LOG_LEVEL_HEADER,
  REQUEST_TYPE_HEADER,
  resolveLogLevel,
  resolveRequestKind,
  routeToShard
} from '@edge-router/routing';
import {readHeader, type DispatchResponse} from '@edge-router/schemas';

import type {ServiceConfig} from './config';
import {badRequest, forbidden, internal, isAppError} from './errors';
import {extractCorrelationId, readBodyBuffer, sendDispatchResponse, sendError, sendJson, sendText} from './http';

export const HEALTH_ROUTE = '/healthz';

export type RequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>;

type PipelineInput = {
  request: IncomingMessage;
  response: ServerResponse;
  correlationId: string;
  route: string;
};

const sanitizeRouteForLog = (rawUrl: string | undefined) => {
  const routeWithoutQuery = (rawUrl ?? '/').split('?', 1)[0] ?? '';
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? '';
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/';
};

const authenticate = ({
  request,
  authToken,
  logger
}: {
  request: IncomingMessage;
  authToken: string;
  logger: StructuredLogger;
}) => {
  const result = validateBearerToken({headers: request.headers, expectedSecret: authToken});
  if (!result.ok) {
    logger.warn({
      event: 'auth.rejected',
      component: 'auth.bearer',
      message: 'Request rejected',
      reason_code: result.error
    });
    throw forbidden('forbidden', FORBIDDEN_MESSAGE);
  }

  logger.debug({
    event: 'auth.accepted',
    component: 'auth.bearer',
    message: 'Request authenticated'
  });
};

/**
 * Wraps a pipeline with the per-request concerns: log context, health checks, the single error
 * boundary and the completion log. Exactly one response is written per request.
 */
const createLifecycleHandler = ({
  component,
  logger,
  now,
  pipeline
}: {
  component: string;
  logger: StructuredLogger;
  now: () => Date;
  pipeline: (input: PipelineInput) => Promise<void>;
}): RequestHandler => {
  return async (request, response) => {
    const correlationId = extractCorrelationId(request);
    const route = sanitizeRouteForLog(request.url);
    const method = (request.method ?? 'GET').toUpperCase();
    const startedAtMs = now().getTime();

    await runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: randomUUID(),
        route,
        method,
        log_level: resolveLogLevel(readHeader(request.headers, LOG_LEVEL_HEADER))
      },
      async () => {
        let responseReasonCode: string | undefined;

        logger.info({
          event: 'request.received',
          component,
          message: 'Request received'
        });

        try {
          if (method === 'GET' && route === HEALTH_ROUTE) {
            sendJson({response, status: 200, correlationId, payload: {status: 'ok'}});
            return;
          }

          await pipeline({request, response, correlationId, route});
        } catch (error) {
          if (response.headersSent) {
            throw error;
          }

          if (isAppError(error)) {
            responseReasonCode = error.code;
            if (error.status === 403) {
              sendText({response, status: 403, correlationId, text: error.message});
              return;
            }

            sendError({response, status: error.status, error: error.code, message: error.message, correlationId});
            return;
          }

          responseReasonCode = 'internal_error';
          logger.error({
            event: 'request.failed',
            component,
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            metadata: {error}
          });

          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          });
        } finally {
          const statusCode = response.statusCode;
          const baseLog = {
            event: 'request.completed',
            component,
            message: 'Request completed',
            status_code: statusCode,
            duration_ms: Math.max(0, now().getTime() - startedAtMs),
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          };

          if (statusCode >= 500) {
            logger.error(baseLog);
          } else if (statusCode >= 400) {
            logger.warn(baseLog);
          } else {
            logger.info(baseLog);
          }
        }
      }
    );
  };
};

export type EdgeRequestHandlerInput = {
  config: Pick<ServiceConfig, 'authToken' | 'maxBodyBytes'>;
  dispatchTarget: RegionalDispatchTarget;
  logger?: StructuredLogger;
  now?: () => Date;
};

/**
 * Edge role: authenticate, classify, route to a shard and hand the request to its regional
 * processor. The processor's answer is relayed unchanged.
 */
export const createEdgeRequestHandler = ({
  config,
  dispatchTarget,
  logger = createNoopLogger(),
  now = () => new Date()
}: EdgeRequestHandlerInput): RequestHandler =>
  createLifecycleHandler({
    component: 'http.edge',
    logger,
    now,
    pipeline: async ({request, response, correlationId, route}) => {
      const tracker = createPipelineTracker({logger});

      tracker.advance('authenticating');
      authenticate({request, authToken: config.authToken, logger});

      tracker.advance('classifying');
      const classification = classifyRequest({headers: request.headers, logger});
      setLogContextFields({region: classification.region});
      const body = await readBodyBuffer({request, maxBodyBytes: config.maxBodyBytes});

      tracker.advance('routing');
      const target = routeToShard({region: classification.region, body});
      setLogContextFields({actor_id: target.actor_id});
      logger.info({
        event: 'routing.target.selected',
        component: 'routing.shard',
        message: 'Regional processor selected',
        metadata: {
          namespace_id: target.namespace_id,
          shard_id: target.shard_id,
          location_hint: target.location_hint,
          is_eu: target.is_eu
        }
      });

      let dispatched: DispatchResponse;
      try {
        dispatched = await dispatchTarget.send({
          target,
          path: route,
          body: body.toString('utf8'),
          request_kind: classification.requestKind,
          log_level: classification.logLevel,
          correlation_id: correlationId
        });
      } catch (error) {
        logger.error({
          event: 'dispatch.request.failed',
          component: 'dispatch',
          message: 'Regional processor unreachable',
          reason_code: 'upstream_failure',
          metadata: {error}
        });
        throw internal('upstream_failure', 'Failed to reach regional processor');
      }

      tracker.advance('done');
      sendDispatchResponse({response, dispatched, correlationId});
    }
  });

export type ProcessorRequestHandlerInput = {
  config: Pick<ServiceConfig, 'authToken' | 'maxBodyBytes'>;
  processor: RegionalProcessor;
  logger?: StructuredLogger;
  now?: () => Date;
};

/**
 * Processor role: accepts requests an edge dispatched over HTTP and runs the regional half of
 * the pipeline for them.
 */
export const createProcessorRequestHandler = ({
  config,
  processor,
  logger = createNoopLogger(),
  now = () => new Date()
}: ProcessorRequestHandlerInput): RequestHandler =>
  createLifecycleHandler({
    component: 'http.processor',
    logger,
    now,
    pipeline: async ({request, response, correlationId, route}) => {
      authenticate({request, authToken: config.authToken, logger});

      const target = parseDispatchTarget(request.headers);
      if (!target.ok) {
        throw badRequest(target.error.code, target.error.message);
      }

      setLogContextFields({region: target.value.region, actor_id: target.value.actor_id});
      const body = await readBodyBuffer({request, maxBodyBytes: config.maxBodyBytes});

      const result = await processor.handle({
        target: target.value,
        path: route,
        body: body.toString('utf8'),
        request_kind: resolveRequestKind(readHeader(request.headers, REQUEST_TYPE_HEADER)),
        log_level: resolveLogLevel(readHeader(request.headers, LOG_LEVEL_HEADER)),
        correlation_id: correlationId
      });

      sendDispatchResponse({response, dispatched: toDispatchResponse(result, correlationId), correlationId});
    }
  });

export const createDispatchTarget = ({
  config,
  logger,
  fetchImpl
}: {
  config: Pick<ServiceConfig, 'authToken' | 'dispatch'>;
  logger: StructuredLogger;
  fetchImpl?: FetchLike;
}): RegionalDispatchTarget =>
  config.dispatch.mode === 'http'
    ? createHttpDispatchTarget({endpoints: config.dispatch.endpoints, authToken: config.authToken, fetchImpl, logger})
    : createInProcessDispatchTarget({fetchImpl, logger});

/**
 * Builds the request handler for the configured role.
 */
export const createEdgeRouterRequestHandler = ({
  config,
  logger = createNoopLogger(),
  fetchImpl,
  dispatchTarget,
  now
}: {
  config: ServiceConfig;
  logger?: StructuredLogger;
  fetchImpl?: FetchLike;
  dispatchTarget?: RegionalDispatchTarget;
  now?: () => Date;
}): RequestHandler => {
  if (config.role === 'processor') {
    return createProcessorRequestHandler({
      config,
      processor: new RegionalProcessor(getRegionProfile(config.processorRegion), {logger, fetchImpl}),
      logger,
      now
    });
  }

  return createEdgeRequestHandler({
    config,
    dispatchTarget: dispatchTarget ?? createDispatchTarget({config, logger, fetchImpl}),
    logger,
    now
  });
};
