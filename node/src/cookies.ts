import { getSetCookies } from 'undici';
import type { Headers } from 'undici';

interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
  path: string;
  secure: boolean;
  /** Epoch milliseconds, absent for session cookies */
  expiresAt?: number;
}

/**
 * In-memory cookie store shared by every request of one connector
 *
 * Set-Cookie headers are parsed by undici; domain and path matching follow RFC 6265.
 */
export class CookieJar {
  private cookies = new Map<string, StoredCookie>();

  /**
   * Number of stored cookies, expired ones included until the next lookup
   */
  get size(): number {
    return this.cookies.size;
  }

  /**
   * Persist the cookies set by a response
   */
  store(url: URL, headers: Headers): string[] {
    const host = url.hostname.toLowerCase();
    const now = Date.now();
    const stored: string[] = [];

    for (const cookie of getSetCookies(headers)) {
      let domain = host;
      let hostOnly = true;
      if (cookie.domain) {
        domain = cookie.domain.toLowerCase();
        hostOnly = false;
        // A server cannot set cookies for another domain
        if (!domainMatches(host, domain)) continue;
      }

      const path = cookie.path?.startsWith('/') ? cookie.path : defaultPath(url.pathname);
      const key = `${domain};${path};${cookie.name}`;

      let expiresAt: number | undefined;
      if (cookie.maxAge !== undefined) {
        expiresAt = now + cookie.maxAge * 1000;
      } else if (cookie.expires !== undefined) {
        expiresAt = cookie.expires instanceof Date ? cookie.expires.getTime() : cookie.expires;
      }

      if (expiresAt !== undefined && expiresAt <= now) {
        this.cookies.delete(key);
        continue;
      }

      this.cookies.set(key, {
        name: cookie.name,
        value: cookie.value,
        domain,
        hostOnly,
        path,
        secure: cookie.secure ?? false,
        expiresAt,
      });
      stored.push(cookie.name);
    }

    return stored;
  }

  /**
   * Value of the Cookie header to send with a request, if any cookie applies
   */
  header(url: URL): string | undefined {
    const host = url.hostname.toLowerCase();
    const now = Date.now();
    const matching: StoredCookie[] = [];

    for (const [key, cookie] of this.cookies) {
      if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) {
        this.cookies.delete(key);
        continue;
      }
      if (cookie.hostOnly ? host !== cookie.domain : !domainMatches(host, cookie.domain)) continue;
      if (!pathMatches(url.pathname, cookie.path)) continue;
      if (cookie.secure && url.protocol !== 'https:') continue;
      matching.push(cookie);
    }

    if (matching.length === 0) {
      return undefined;
    }

    // Most specific paths first
    matching.sort((a, b) => b.path.length - a.path.length);
    return matching.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }

  /**
   * Forget every cookie, e.g. to drop a session
   */
  clear(): void {
    this.cookies.clear();
  }
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith('/') || requestPath[cookiePath.length] === '/';
}

function defaultPath(requestPath: string): string {
  const lastSlash = requestPath.lastIndexOf('/');
  if (!requestPath.startsWith('/') || lastSlash <= 0) {
    return '/';
  }
  return requestPath.slice(0, lastSlash);
}
