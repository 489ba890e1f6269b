import type { Dispatcher, Headers } from 'undici';

/**
 * JSON-RPC 2.0 Types
 */

/** Keyword arguments sent as the `params` object of a call */
export type JSONRPCParams = Record<string, unknown>;

/** JSON-RPC 2.0 Request, as sent by the JSON proxy */
export interface JSONRPCRequest {
  jsonrpc: '2.0';
  method: 'call';
  params: JSONRPCParams;
  id: number;
}

/** Details attached by the server to a fault */
export interface JSONRPCErrorData {
  /** Fully qualified name of the server-side exception class */
  name?: string;
  /** Exception message */
  message?: string;
  /** Server-side traceback */
  debug?: string;
  [key: string]: unknown;
}

/** JSON-RPC 2.0 Error object */
export interface JSONRPCErrorObject {
  code?: number;
  message: string;
  data?: JSONRPCErrorData;
}

/** JSON-RPC 2.0 Response (success) */
export interface JSONRPCResponse<TResult = unknown> {
  jsonrpc?: '2.0';
  id: string | number | null;
  result: TResult;
}

/** JSON-RPC 2.0 Response (error) */
export interface JSONRPCErrorResponse {
  jsonrpc?: '2.0';
  id: string | number | null;
  error: JSONRPCErrorObject;
}

/**
 * Turns a raw response body into the value handed back to the caller.
 * Either the decoded envelope, or the body text left as is.
 */
export type ResponseDecoder<TResponse> = (body: string, status: number) => TResponse;

/**
 * HTTP request handed to a {@link Transport}
 */
export interface TransportRequest {
  method: 'GET' | 'POST';
  url: URL;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

/**
 * HTTP response returned by a {@link Transport}
 */
export interface TransportResponse {
  status: number;
  headers: Headers;
  body: Buffer;
}

/**
 * Request/response channel shared by the proxies of one connector
 */
export interface Transport {
  /** Timeout in seconds applied to every subsequent request */
  timeout: number;
  request(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Transport Configuration Options
 */
export interface TransportConfig {
  /**
   * Request timeout in seconds
   * @default 120
   */
  timeout?: number;

  /**
   * undici dispatcher used for every request (connection pool, proxy agent...)
   * @default the global dispatcher
   */
  dispatcher?: Dispatcher;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;
}

/**
 * Connector Configuration Options
 */
export interface ConnectorConfig extends TransportConfig {
  /** Server hostname or IP address */
  host: string;

  /**
   * Server port, an integer or an integer-like string
   * @default 8069
   */
  port?: number | string;

  /**
   * Server version. Detected from the server when omitted.
   */
  version?: string;

  /**
   * Decode JSON-RPC responses. When false, calls resolve to the raw body text.
   * @default true
   */
  deserialize?: boolean;
}

/** Options of a plain HTTP request */
export interface HTTPRequestOptions {
  /** @default 'POST' when a body is given, 'GET' otherwise */
  method?: 'GET' | 'POST';
  body?: string | Uint8Array;
  headers?: Record<string, string>;
}

/**
 * Target server of a proxy
 */
export interface ProxyConfig {
  host: string;
  port: number;
  /** Use `https` instead of `http` */
  ssl: boolean;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;
}
