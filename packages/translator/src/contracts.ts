export type OutboundHeader = {
  name: string;
  value: string;
};

export type OutboundHeaderList = OutboundHeader[];

/**
 * A request ready for the wire. Header names are lower-case and unique.
 */
export type OutboundHttpRequest = {
  url: string;
  method: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';
  headers: OutboundHeaderList;
  body?: string;
};
