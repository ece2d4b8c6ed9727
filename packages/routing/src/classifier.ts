import {createNoopLogger, type StructuredLogger} from '@edge-router/logging';
import {
  DEFAULT_REGION,
  readHeader,
  type InboundHeaders,
  type RegionCode,
  type RequestKind,
  type RequestLogLevel
} from '@edge-router/schemas';

import {parseRegionCode} from './regions';

export const REGION_HEADER = 'x-cf-region';
export const REQUEST_TYPE_HEADER = 'x-request-type';
export const LOG_LEVEL_HEADER = 'x-log-level';

export type RequestClassification = {
  region: RegionCode;
  requestKind: RequestKind;
  logLevel: RequestLogLevel;
};

export const resolveRequestKind = (value: string | undefined): RequestKind =>
  value?.trim().toLowerCase() === 'soap' ? 'soap' : 'http';

export const resolveLogLevel = (value: string | undefined): RequestLogLevel =>
  value?.trim().toLowerCase() === 'debug' ? 'debug' : 'info';

export const resolveRegion = ({
  value,
  logger = createNoopLogger()
}: {
  value: string | undefined;
  logger?: StructuredLogger;
}): RegionCode => {
  if (value === undefined) {
    return DEFAULT_REGION;
  }

  const region = parseRegionCode(value);
  if (region) {
    return region;
  }

  logger.info({
    event: 'routing.region.defaulted',
    component: 'routing.classifier',
    message: `Unknown region, defaulting to ${DEFAULT_REGION}`,
    reason_code: 'region_unknown',
    metadata: {requested_region: value}
  });
  return DEFAULT_REGION;
};

export const classifyRequest = ({
  headers,
  logger = createNoopLogger()
}: {
  headers: InboundHeaders;
  logger?: StructuredLogger;
}): RequestClassification => {
  const classification = {
    region: resolveRegion({value: readHeader(headers, REGION_HEADER), logger}),
    requestKind: resolveRequestKind(readHeader(headers, REQUEST_TYPE_HEADER)),
    logLevel: resolveLogLevel(readHeader(headers, LOG_LEVEL_HEADER))
  };

  logger.debug({
    event: 'routing.request.classified',
    component: 'routing.classifier',
    message: 'Request classified',
    region: classification.region,
    metadata: {
      request_kind: classification.requestKind,
      log_level: classification.logLevel
    }
  });

  return classification;
};
