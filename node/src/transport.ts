import { fetch, getGlobalDispatcher } from 'undici';
import { DEFAULT_TIMEOUT, parseTimeout } from './config.js';
import { CookieJar } from './cookies.js';
import { ConnectionError } from './errors.js';
import type { Transport, TransportConfig, TransportRequest, TransportResponse } from './types.js';

/**
 * HTTP transport shared by the JSON and HTTP proxies of a connector
 *
 * Every response's cookies land in one {@link CookieJar} and are replayed on the
 * following requests, so a session opened through one proxy is seen by the other.
 *
 * @example
 * ```typescript
 * const transport = new HTTPTransport({ timeout: 30 });
 * const response = await transport.request({
 *   method: 'GET',
 *   url: new URL('http://localhost:8069/web/login'),
 * });
 * console.log(response.status, response.body.toString());
 * ```
 */
export class HTTPTransport implements Transport {
  readonly cookies = new CookieJar();
  private config: Required<TransportConfig>;

  constructor(config: TransportConfig = {}) {
    this.config = {
      timeout: parseTimeout(config.timeout ?? DEFAULT_TIMEOUT),
      dispatcher: config.dispatcher ?? getGlobalDispatcher(),
      debug: config.debug ?? false,
    };
  }

  /**
   * Timeout in seconds, applied to every request sent after it is set
   */
  get timeout(): number {
    return this.config.timeout;
  }

  set timeout(timeout: number) {
    this.config.timeout = parseTimeout(timeout);
  }

  /**
   * Send one HTTP request and read the whole response body
   *
   * Redirects are followed here rather than by fetch, so the cookies of every hop
   * reach the jar. One timeout covers the whole chain.
   * @throws {ConnectionError} on network failure, timeout or too many redirects
   */
  async request(request: TransportRequest): Promise<TransportResponse> {
    const timeout = this.config.timeout;
    const signal = AbortSignal.timeout(Math.ceil(timeout * 1000));

    let hop: TransportRequest = request;
    for (let redirects = 0; ; redirects++) {
      const response = await this.fetchOnce(hop, signal, timeout);
      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || location === null) {
        return response;
      }
      if (redirects === MAX_REDIRECTS) {
        const reason = `more than ${MAX_REDIRECTS} redirects`;
        this.log('Request failed:', reason);
        throw new ConnectionError(request.url.href, reason);
      }
      hop = redirectRequest(hop, response.status, location);
      this.log('Redirected to', hop.url.href);
    }
  }

  private async fetchOnce(
    request: TransportRequest,
    signal: AbortSignal,
    timeout: number
  ): Promise<TransportResponse> {
    const { method, url } = request;
    const headers: Record<string, string> = { ...request.headers };
    const cookie = this.cookies.header(url);
    if (cookie) {
      headers.cookie = cookie;
    }

    this.log(method, url.href);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: request.body,
        redirect: 'manual',
        dispatcher: this.config.dispatcher,
        signal,
      });
      const body = Buffer.from(await response.arrayBuffer());

      const stored = this.cookies.store(url, response.headers);
      if (stored.length > 0) {
        this.log('Stored cookies:', stored.join(', '));
      }
      this.log('Received', response.status, `(${body.length} bytes)`);

      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      const reason = describeFailure(error, timeout);
      this.log('Request failed:', reason);
      throw new ConnectionError(url.href, reason, { cause: error });
    }
  }

  /**
   * Debug logging
   * @private
   */
  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.log('[HTTPTransport]', ...args);
    }
  }
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const MAX_REDIRECTS = 20;

/**
 * Next request of a redirect chain. 307 and 308 repeat the request; the others
 * turn a POST into a GET without body.
 */
function redirectRequest(
  request: TransportRequest,
  status: number,
  location: string
): TransportRequest {
  let url: URL;
  try {
    url = new URL(location, request.url);
  } catch (error) {
    throw new ConnectionError(request.url.href, `invalid redirect location '${location}'`, {
      cause: error,
    });
  }

  if (status === 307 || status === 308 || request.method === 'GET') {
    return { ...request, url };
  }

  const headers = Object.fromEntries(
    Object.entries(request.headers ?? {}).filter(([name]) => name.toLowerCase() !== 'content-type')
  );
  return { method: 'GET', url, headers };
}

function describeFailure(error: unknown, timeout: number): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.name === 'TimeoutError') {
    return `timed out after ${timeout}s`;
  }
  // undici reports network failures as "fetch failed" with the socket error as cause
  if (error.cause instanceof Error) {
    return error.cause.message;
  }
  return error.message;
}
