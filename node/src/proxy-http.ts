import { BaseProxy } from './base-proxy.js';
import { ConnectorError } from './errors.js';
import type { HTTPRequestOptions, TransportResponse } from './types.js';

/**
 * Plain HTTP proxy for the server's `http` controllers (reports, downloads...)
 *
 * No JSON is involved: the caller gets the status, headers and raw body bytes.
 *
 * @example
 * ```typescript
 * const response = await proxy.get('/web/content/42?download=true');
 * if (response.status === 200) {
 *   await writeFile('attachment.pdf', response.body);
 * }
 * ```
 */
export class ProxyHTTP extends BaseProxy {
  /**
   * Send a request to a path on the server
   *
   * String bodies are sent as `application/x-www-form-urlencoded` unless the headers
   * give another content type.
   */
  async request(path: string, options: HTTPRequestOptions = {}): Promise<TransportResponse> {
    const method = options.method ?? (options.body !== undefined ? 'POST' : 'GET');
    if (method === 'GET' && options.body !== undefined) {
      throw new ConnectorError('A GET request cannot have a body');
    }

    const url = this.resolve(path);
    this.log(method, url.href);

    return this.transport.request({
      method,
      url,
      headers: withContentType(options.headers, options.body),
      body: options.body,
    });
  }

  get(path: string, headers?: Record<string, string>): Promise<TransportResponse> {
    return this.request(path, { method: 'GET', headers });
  }

  post(
    path: string,
    body: string | Uint8Array,
    headers?: Record<string, string>
  ): Promise<TransportResponse> {
    return this.request(path, { method: 'POST', body, headers });
  }
}

function withContentType(
  headers: Record<string, string> | undefined,
  body: string | Uint8Array | undefined
): Record<string, string> | undefined {
  if (typeof body !== 'string') {
    return headers;
  }
  const given = Object.keys(headers ?? {}).some((name) => name.toLowerCase() === 'content-type');
  return given ? headers : { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' };
}
