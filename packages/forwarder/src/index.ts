export type {FetchLike} from './contracts';
export {
  err,
  forwarderErrorCodes,
  ok,
  type ForwarderError,
  type ForwarderErrorCode,
  type ForwarderFailure,
  type ForwarderResult,
  type ForwarderSuccess
} from './errors';
export {forwardOutboundRequest} from './forward';
export {
  collectResponseHeaders,
  isSuccessStatus,
  reasonPhraseFor,
  reduceUpstreamResponse,
  UNKNOWN_STATUS_REASON
} from './reducer';
