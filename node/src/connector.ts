import { z } from 'zod';
import { decodeResponse, rawResponse } from './codec.js';
import { DEFAULT_PORT, parsePort } from './config.js';
import type { CookieJar } from './cookies.js';
import { ConfigurationError } from './errors.js';
import { ProxyHTTP } from './proxy-http.js';
import { ProxyJSON } from './proxy-json.js';
import { HTTPTransport } from './transport.js';
import type { ConnectorConfig, JSONRPCResponse, ResponseDecoder } from './types.js';

/** Endpoint answering the server version, among other things */
export const VERSION_INFO_PATH = '/web/webclient/version_info';

const versionInfoSchema = z.object({ server_version: z.string().optional() }).passthrough();

/**
 * What distinguishes the connector variants
 */
export interface ConnectorVariant<TResponse> {
  /** Use `https` for every request */
  ssl: boolean;
  /** Decoder of JSON-RPC response bodies */
  decode: ResponseDecoder<TResponse>;
}

/**
 * Connector to a server speaking JSON-RPC over HTTP
 *
 * Owns one {@link HTTPTransport} (and so one cookie jar) shared by its JSON and
 * HTTP proxies: a session opened through one is used by the other. Unless given,
 * the server version is detected before the first JSON call.
 *
 * @example
 * ```typescript
 * const connector = createConnector({ host: 'localhost', port: 8069 });
 *
 * await connector.proxyJSON
 *   .at('/web/session/authenticate')
 *   .invoke({ db: 'demo', login: 'admin', password: 'admin' });
 *
 * const report = await connector.proxyHTTP.get('/report/pdf/sale.report_saleorder/1');
 * ```
 */
export class Connector<TResponse = JSONRPCResponse> {
  readonly host: string;
  readonly port: number;
  readonly ssl: boolean;
  readonly deserialize: boolean;
  readonly proxyJSON: ProxyJSON<TResponse>;
  readonly proxyHTTP: ProxyHTTP;
  private readonly transport: HTTPTransport;
  private readonly debug: boolean;
  private serverVersion: string | undefined;
  private versionDetection: Promise<string | undefined> | undefined;

  constructor(config: ConnectorConfig, variant: ConnectorVariant<TResponse>) {
    this.host = config.host;
    this.port = parsePort(config.port ?? DEFAULT_PORT);
    this.ssl = variant.ssl;
    this.deserialize = config.deserialize ?? true;
    this.debug = config.debug ?? false;
    this.serverVersion = config.version;

    this.transport = new HTTPTransport({
      timeout: config.timeout,
      dispatcher: config.dispatcher,
      debug: this.debug,
    });

    const proxyConfig = { host: this.host, port: this.port, ssl: this.ssl, debug: this.debug };
    this.proxyJSON = new ProxyJSON(this.transport, proxyConfig, variant.decode, () =>
      this.detectVersion()
    );
    this.proxyHTTP = new ProxyHTTP(this.transport, proxyConfig);
  }

  get scheme(): 'http' | 'https' {
    return this.ssl ? 'https' : 'http';
  }

  /**
   * Server version, `undefined` until given or detected
   */
  get version(): string | undefined {
    return this.serverVersion;
  }

  /**
   * Timeout in seconds of both proxies
   */
  get timeout(): number {
    return this.transport.timeout;
  }

  set timeout(timeout: number) {
    this.transport.timeout = timeout;
  }

  /**
   * Cookies shared by both proxies
   */
  get cookies(): CookieJar {
    return this.transport.cookies;
  }

  /**
   * Ask the server for its version, unless it is already known
   *
   * A response without `server_version` leaves the version unknown. The response is
   * decoded even when the connector does not deserialize its calls.
   */
  detectVersion(): Promise<string | undefined> {
    if (this.serverVersion !== undefined) {
      return Promise.resolve(this.serverVersion);
    }
    if (!this.versionDetection) {
      this.versionDetection = this.fetchVersion().catch((error: unknown) => {
        // Let a later call try again
        this.versionDetection = undefined;
        throw error;
      });
    }
    return this.versionDetection;
  }

  private async fetchVersion(): Promise<string | undefined> {
    const response = await this.proxyJSON.send(VERSION_INFO_PATH);
    const { result } = decodeResponse(response.body.toString('utf8'), response.status);

    const info = versionInfoSchema.safeParse(result);
    if (info.success && info.data.server_version !== undefined) {
      this.serverVersion = info.data.server_version;
      this.log('Server version', this.serverVersion);
    } else {
      this.log('Server version unknown');
    }
    return this.serverVersion;
  }

  /**
   * Debug logging
   * @private
   */
  private log(...args: unknown[]): void {
    if (this.debug) {
      console.log('[Connector]', ...args);
    }
  }
}

/**
 * Connector variants by protocol name
 */
export const PROTOCOLS = {
  jsonrpc: { ssl: false },
  'jsonrpc+ssl': { ssl: true },
} as const satisfies Record<string, { ssl: boolean }>;

export type Protocol = keyof typeof PROTOCOLS;

export function isProtocol(name: string): name is Protocol {
  return Object.prototype.hasOwnProperty.call(PROTOCOLS, name);
}

function openConnector(
  config: ConnectorConfig,
  ssl: boolean
): Connector<JSONRPCResponse> | Connector<string> {
  return config.deserialize === false
    ? new Connector(config, { ssl, decode: rawResponse })
    : new Connector(config, { ssl, decode: decodeResponse });
}

/**
 * Connector over plain HTTP
 */
export function createConnector(config: ConnectorConfig & { deserialize: false }): Connector<string>;
export function createConnector(
  config: ConnectorConfig & { deserialize?: true }
): Connector<JSONRPCResponse>;
export function createConnector(
  config: ConnectorConfig
): Connector<JSONRPCResponse> | Connector<string>;
export function createConnector(
  config: ConnectorConfig
): Connector<JSONRPCResponse> | Connector<string> {
  return openConnector(config, false);
}

/**
 * Connector over HTTPS
 */
export function createSSLConnector(
  config: ConnectorConfig & { deserialize: false }
): Connector<string>;
export function createSSLConnector(
  config: ConnectorConfig & { deserialize?: true }
): Connector<JSONRPCResponse>;
export function createSSLConnector(
  config: ConnectorConfig
): Connector<JSONRPCResponse> | Connector<string>;
export function createSSLConnector(
  config: ConnectorConfig
): Connector<JSONRPCResponse> | Connector<string> {
  return openConnector(config, true);
}

/**
 * Build the connector of a protocol (a {@link PROTOCOLS} key) and detect the server version
 *
 * @example
 * ```typescript
 * const connector = await connect('jsonrpc+ssl', { host: 'erp.example.com', port: 443 });
 * console.log(connector.version);
 * ```
 */
export function connect(
  protocol: string,
  config: ConnectorConfig & { deserialize: false }
): Promise<Connector<string>>;
export function connect(
  protocol: string,
  config: ConnectorConfig & { deserialize?: true }
): Promise<Connector<JSONRPCResponse>>;
export function connect(
  protocol: string,
  config: ConnectorConfig
): Promise<Connector<JSONRPCResponse> | Connector<string>>;
export async function connect(
  protocol: string,
  config: ConnectorConfig
): Promise<Connector<JSONRPCResponse> | Connector<string>> {
  if (!isProtocol(protocol)) {
    throw new ConfigurationError(`The protocol '${protocol}' is not supported.`);
  }
  const connector = openConnector(config, PROTOCOLS[protocol].ssl);
  await connector.detectVersion();
  return connector;
}
