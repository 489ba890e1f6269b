import { ConfigurationError } from './errors.js';
import type { ProxyConfig, Transport } from './types.js';

/**
 * Server address and transport shared by the JSON and HTTP proxies.
 * A proxy only references the transport; the connector owns it.
 */
export abstract class BaseProxy {
  readonly host: string;
  readonly port: number;
  readonly ssl: boolean;
  protected readonly transport: Transport;
  protected readonly debug: boolean;
  private readonly rootURL: URL;

  constructor(transport: Transport, config: ProxyConfig) {
    this.transport = transport;
    this.host = config.host;
    this.port = config.port;
    this.ssl = config.ssl;
    this.debug = config.debug ?? false;

    // IPv6 literals need brackets in a URL
    const hostname = this.host.includes(':') && !this.host.startsWith('[') ? `[${this.host}]` : this.host;
    try {
      this.rootURL = new URL(`${this.scheme}://${hostname}:${this.port}/`);
    } catch (error) {
      throw new ConfigurationError(`The host '${this.host}' is invalid.`, { cause: error });
    }
  }

  get scheme(): 'http' | 'https' {
    return this.ssl ? 'https' : 'http';
  }

  /**
   * Timeout in seconds of the shared transport
   */
  get timeout(): number {
    return this.transport.timeout;
  }

  /**
   * Absolute URL of a path (with its query string) on the server
   * @throws {ConfigurationError} when the path names another scheme, host or port
   */
  resolve(path: string): URL {
    const url = new URL(path, this.rootURL);
    if (url.origin !== this.rootURL.origin) {
      throw new ConfigurationError(`The path '${path}' is not on ${this.rootURL.origin}.`);
    }
    return url;
  }

  protected log(...args: unknown[]): void {
    if (this.debug) {
      console.log(`[${this.constructor.name}]`, ...args);
    }
  }
}
