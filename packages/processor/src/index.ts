export {
  createHttpDispatchTarget,
  createInProcessDispatchTarget,
  DISPATCH_HEADERS,
  parseDispatchTarget,
  RegionEndpointMissingError,
  toDispatchHeaders,
  toDispatchResponse,
  type RegionalDispatchTarget,
  type RegionEndpoints
} from './dispatch';
export {
  err,
  ok,
  processorErrorCodes,
  type ProcessorError,
  type ProcessorErrorCode,
  type ProcessorFailure,
  type ProcessorResult,
  type ProcessorSuccess
} from './errors';
export {createPipelineTracker, type PipelineTracker} from './pipeline';
export {RegionalProcessor, type RegionalProcessorOptions} from './processor';
