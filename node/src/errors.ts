import type { JSONRPCErrorData, JSONRPCErrorObject } from './types.js';

/**
 * Base class of every error raised by the connector
 */
export class ConnectorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid connector or transport setting (port, timeout)
 */
export class ConfigurationError extends ConnectorError {}

/**
 * The request never got a response: refused connection, DNS or TLS failure, timeout
 */
export class ConnectionError extends ConnectorError {
  readonly url: string;
  readonly reason: string;

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Request to ${url} failed: ${reason}`, options);
    this.url = url;
    this.reason = reason;
  }
}

/**
 * The server answered with something that is not a JSON-RPC response
 */
export class ProtocolError extends ConnectorError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
    this.body = body;
  }
}

/**
 * Fault reported by the server in a JSON-RPC `error` response
 *
 * @example
 * ```typescript
 * try {
 *   await connector.proxyJSON.call('/web/session/authenticate', { db, login, password });
 * } catch (error) {
 *   if (error instanceof JSONRPCError && error.remoteName === 'odoo.exceptions.AccessDenied') {
 *     // wrong credentials
 *   }
 * }
 * ```
 */
export class JSONRPCError extends ConnectorError implements JSONRPCErrorObject {
  code?: number;
  data?: JSONRPCErrorData;

  constructor(error: JSONRPCErrorObject) {
    super(error.message);
    this.code = error.code;
    this.data = error.data;
  }

  /** Name of the server-side exception class, e.g. `odoo.exceptions.AccessDenied` */
  get remoteName(): string | undefined {
    return this.data?.name;
  }

  /** Message of the server-side exception */
  get remoteMessage(): string | undefined {
    return this.data?.message;
  }

  /** Server-side traceback */
  get debug(): string | undefined {
    return this.data?.debug;
  }
}
