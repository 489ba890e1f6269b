import { BaseProxy } from './base-proxy.js';
import { encodeRequest } from './codec.js';
import type {
  JSONRPCParams,
  JSONRPCResponse,
  ProxyConfig,
  ResponseDecoder,
  Transport,
  TransportResponse,
} from './types.js';

/**
 * A not yet invoked endpoint of the server, e.g. `/web/dataset/call`
 *
 * Endpoints are immutable: every {@link JSONEndpoint.segment} call returns a new one.
 */
export class JSONEndpoint<TResponse = JSONRPCResponse> {
  readonly segments: readonly string[];
  private readonly proxy: ProxyJSON<TResponse>;

  constructor(proxy: ProxyJSON<TResponse>, segments: readonly string[]) {
    this.proxy = proxy;
    this.segments = segments;
  }

  /**
   * URL path of the endpoint
   */
  get path(): string {
    return joinPath(this.segments);
  }

  get url(): URL {
    return this.proxy.resolve(this.path);
  }

  /**
   * Endpoint one (or, for a slash-delimited name, several) segments deeper
   */
  segment(name: string): JSONEndpoint<TResponse> {
    return new JSONEndpoint(this.proxy, [...this.segments, ...splitPath(name)]);
  }

  /** Same as {@link JSONEndpoint.segment}, reads better with full paths */
  at(path: string): JSONEndpoint<TResponse> {
    return this.segment(path);
  }

  /**
   * Call the endpoint with keyword arguments
   */
  invoke(params: JSONRPCParams = {}): Promise<TResponse> {
    return this.proxy.call(this.segments, params);
  }
}

/**
 * JSON-RPC proxy addressing the server's `json` controllers by path
 *
 * @example
 * ```typescript
 * const partners = await proxy
 *   .segment('web')
 *   .segment('dataset')
 *   .segment('call')
 *   .invoke({ model: 'res.partner', method: 'read', args: [[1]] });
 *
 * // Same request
 * await proxy.at('/web/dataset/call').invoke({ model: 'res.partner', method: 'read', args: [[1]] });
 * await proxy.call('/web/dataset/call', { model: 'res.partner', method: 'read', args: [[1]] });
 * ```
 */
export class ProxyJSON<TResponse = JSONRPCResponse> extends BaseProxy {
  private readonly decode: ResponseDecoder<TResponse>;
  private readonly prepare: (() => Promise<unknown>) | undefined;

  /**
   * @param prepare - awaited before every {@link ProxyJSON.call}, e.g. to learn the
   * server version first
   */
  constructor(
    transport: Transport,
    config: ProxyConfig,
    decode: ResponseDecoder<TResponse>,
    prepare?: () => Promise<unknown>
  ) {
    super(transport, config);
    this.decode = decode;
    this.prepare = prepare;
  }

  /**
   * Endpoint with an empty path
   */
  get root(): JSONEndpoint<TResponse> {
    return new JSONEndpoint(this, []);
  }

  segment(name: string): JSONEndpoint<TResponse> {
    return this.root.segment(name);
  }

  at(path: string): JSONEndpoint<TResponse> {
    return this.root.segment(path);
  }

  /**
   * Send one call and decode its response
   * @throws {JSONRPCError} when the server reports a fault
   * @throws {ProtocolError} when the response is not a JSON-RPC response
   * @throws {ConnectionError} when no response was received
   */
  async call(path: string | readonly string[], params: JSONRPCParams = {}): Promise<TResponse> {
    if (this.prepare) {
      await this.prepare();
    }
    const response = await this.send(path, params);
    return this.decode(response.body.toString('utf8'), response.status);
  }

  /**
   * Send one call and return the HTTP response without decoding it.
   * Unlike {@link ProxyJSON.call}, nothing is awaited first.
   */
  async send(path: string | readonly string[], params: JSONRPCParams = {}): Promise<TransportResponse> {
    const endpointPath = joinPath(typeof path === 'string' ? splitPath(path) : path);
    const request = encodeRequest(params);
    this.log('Calling', endpointPath, `(id ${request.id})`);

    return this.transport.request({
      method: 'POST',
      url: this.resolve(endpointPath),
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    });
  }
}

/**
 * Split a slash-delimited path into segments, dropping empty ones
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * URL path of a list of segments
 */
export function joinPath(segments: readonly string[]): string {
  return `/${segments.map((segment) => encodeURIComponent(segment)).join('/')}`;
}
