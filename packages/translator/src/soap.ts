import {
  isLosslessNumber,
  stringifyJsonLossless,
  type JsonValue,
  type SoapParam,
  type SoapRequestData
} from '@edge-router/schemas';

import type {OutboundHeaderList, OutboundHttpRequest} from './contracts';
import {err, ok, type TranslatorResult} from './errors';
import {normalizeCallerHeaders, withFixedHeaders} from './headers';

/**
 * The receiving partner checks the payload against what the NuSOAP 0.9.17 client sends, so the
 * envelope, the `ns1766` prefix and the headers below must stay byte-for-byte identical.
 */
export const SOAP_XML_DECLARATION = '<?xml version="1.0" encoding="ISO-8859-1"?>';

const SOAP_ENVELOPE_OPEN =
  '<SOAP-ENV:Envelope SOAP-ENV:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/"' +
  ' xmlns:SOAP-ENV="http://schemas.xmlsoap.org/soap/envelope/"' +
  ' xmlns:xsd="http://www.w3.org/2001/XMLSchema"' +
  ' xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"' +
  ' xmlns:SOAP-ENC="http://schemas.xmlsoap.org/soap/encoding/">';

const SOAP_BODY_OPEN = '<SOAP-ENV:Body>';
const SOAP_BODY_CLOSE = '</SOAP-ENV:Body></SOAP-ENV:Envelope>';
const ACTION_PREFIX = 'ns1766';

export const SOAP_FIXED_HEADERS: OutboundHeaderList = [
  {name: 'content-type', value: 'text/xml; charset=ISO-8859-1'},
  {name: 'soapaction', value: '""'},
  {name: 'user-agent', value: 'NuSOAP/0.9.17 (1.123)'}
];

const NUMERIC_KEY_REGEX = /^\p{N}*$/u;

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export const escapeHtml = (value: string) => value.replace(/[&<>"']/gu, character => HTML_ENTITIES[character] ?? character);

/**
 * Keys made only of digits are not valid element names; NuSOAP emits them as `__numeric_<key>`.
 */
export const toElementName = (key: string) => (NUMERIC_KEY_REGEX.test(key) ? `__numeric_${key}` : key);

export type SoapTypedValue = {
  type: 'xsd:boolean' | 'xsd:int' | 'xsd:string';
  text: string;
};

/**
 * Numbers parsed losslessly are written with their source text (`44.0`, `1e21`).
 */
export const toSoapTypedValue = (value: JsonValue): SoapTypedValue => {
  if (typeof value === 'boolean') {
    return {type: 'xsd:boolean', text: String(value)};
  }

  if (isLosslessNumber(value)) {
    return {type: 'xsd:int', text: value.value};
  }

  if (typeof value === 'number') {
    return {type: 'xsd:int', text: String(value)};
  }

  if (typeof value === 'string') {
    return {type: 'xsd:string', text: escapeHtml(value)};
  }

  if (value === null) {
    return {type: 'xsd:string', text: ''};
  }

  return {type: 'xsd:string', text: stringifyJsonLossless(value)};
};

const renderParam = ([key, value]: SoapParam) => {
  const element = toElementName(key);
  const {type, text} = toSoapTypedValue(value);
  return `<${element} xsi:type="${type}">${text}</${element}>`;
};

/**
 * Renders the complete request payload on a single line, parameters in the order given.
 */
export const buildSoapEnvelope = ({
  action,
  namespace,
  params
}: {
  action: string;
  namespace: string;
  params: readonly SoapParam[];
}) =>
  [
    SOAP_XML_DECLARATION,
    SOAP_ENVELOPE_OPEN,
    SOAP_BODY_OPEN,
    `<${ACTION_PREFIX}:${action} xmlns:${ACTION_PREFIX}="${namespace}">`,
    ...params.map(renderParam),
    `</${ACTION_PREFIX}:${action}>`,
    SOAP_BODY_CLOSE
  ].join('');

export const translateSoapRequest = (data: SoapRequestData): TranslatorResult<OutboundHttpRequest> => {
  try {
    new URL(data.url);
  } catch {
    return err('request_url_invalid', `Invalid request URL: ${data.url}`);
  }

  const callerHeaders = normalizeCallerHeaders(data.headers);
  if (!callerHeaders.ok) {
    return callerHeaders;
  }

  return ok({
    url: data.url,
    method: 'POST',
    headers: withFixedHeaders(callerHeaders.value, SOAP_FIXED_HEADERS),
    body: buildSoapEnvelope(data)
  });
};
