export const EDGE_ROUTER_CONFIG = Symbol('EDGE_ROUTER_CONFIG');
export const EDGE_ROUTER_LOGGER = Symbol('EDGE_ROUTER_LOGGER');
export const EDGE_ROUTER_FETCH_IMPL = Symbol('EDGE_ROUTER_FETCH_IMPL');
export const EDGE_ROUTER_DISPATCH_TARGET = Symbol('EDGE_ROUTER_DISPATCH_TARGET');
export const EDGE_ROUTER_REQUEST_HANDLER = Symbol('EDGE_ROUTER_REQUEST_HANDLER');
