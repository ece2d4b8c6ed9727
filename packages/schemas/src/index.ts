export {
  DEFAULT_REGION,
  RegionCodeSchema,
  RegionProfileSchema,
  RequestKindSchema,
  RequestLogLevelSchema,
  TargetDescriptorSchema,
  type RegionCode,
  type RegionProfile,
  type RequestKind,
  type RequestLogLevel,
  type TargetDescriptor
} from './regions';
export {
  HttpMethodSchema,
  httpMethods,
  JsonValueSchema,
  RequestDataSchema,
  SoapParamSchema,
  SoapRequestDataSchema,
  type HttpMethod,
  type JsonValue,
  type RequestData,
  type SoapParam,
  type SoapRequestData
} from './requests';
export {
  ErrorEnvelopeSchema,
  type ApiErrorResponse,
  type ApiResponse,
  type ApiSuccessResponse,
  type ErrorEnvelope
} from './responses';
export {
  DispatchRequestSchema,
  DispatchResponseSchema,
  PipelineStageSchema,
  type DispatchRequest,
  type DispatchResponse,
  type PipelineStage
} from './dispatch';
export {
  isLosslessNumber,
  LosslessNumber,
  parseJsonLossless,
  stringifyJsonLossless
} from './json';
export {LogEventSchema, type LogEvent} from './logEvent';
export {readHeader, type InboundHeaders} from './headers';
