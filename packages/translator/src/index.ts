export type {OutboundHeader, OutboundHeaderList, OutboundHttpRequest} from './contracts';
export {
  err,
  ok,
  translatorErrorCodes,
  type TranslatorError,
  type TranslatorErrorCode,
  type TranslatorFailure,
  type TranslatorResult,
  type TranslatorSuccess
} from './errors';
export {
  hasHeader,
  normalizeCallerHeaders,
  normalizeHeaderName,
  validateHeaderValue,
  withDefaultHeader,
  withFixedHeaders
} from './headers';
export {DEFAULT_USER_AGENT, placesParamsInQuery, translateProxyRequest} from './passthrough';
export {
  buildSoapEnvelope,
  escapeHtml,
  SOAP_FIXED_HEADERS,
  SOAP_XML_DECLARATION,
  toElementName,
  toSoapTypedValue,
  translateSoapRequest,
  type SoapTypedValue
} from './soap';
