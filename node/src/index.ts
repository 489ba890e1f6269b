/**
 * node-odoo-rpc
 *
 * TypeScript connector for servers exposing JSON-RPC over HTTP (Odoo and friends),
 * with a plain HTTP channel sharing the same session cookies
 *
 * @packageDocumentation
 */

export { decodeResponse, encodeRequest, createRequestId, rawResponse } from './codec.js';
export { DEFAULT_PORT, DEFAULT_TIMEOUT, MAX_TIMEOUT, parsePort, parseTimeout } from './config.js';
export {
  Connector,
  PROTOCOLS,
  VERSION_INFO_PATH,
  connect,
  createConnector,
  createSSLConnector,
  isProtocol,
} from './connector.js';
export type { ConnectorVariant, Protocol } from './connector.js';
export { CookieJar } from './cookies.js';
export {
  ConfigurationError,
  ConnectionError,
  ConnectorError,
  JSONRPCError,
  ProtocolError,
} from './errors.js';
export { ProxyHTTP } from './proxy-http.js';
export { JSONEndpoint, ProxyJSON, joinPath, splitPath } from './proxy-json.js';
export { HTTPTransport } from './transport.js';
export type {
  ConnectorConfig,
  HTTPRequestOptions,
  JSONRPCErrorData,
  JSONRPCErrorObject,
  JSONRPCErrorResponse,
  JSONRPCParams,
  JSONRPCRequest,
  JSONRPCResponse,
  ProxyConfig,
  ResponseDecoder,
  Transport,
  TransportConfig,
  TransportRequest,
  TransportResponse,
} from './types.js';
