import { Headers } from 'undici';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CookieJar } from '../src/cookies.js';

function setCookies(...values: string[]): Headers {
  const headers = new Headers();
  for (const value of values) {
    headers.append('set-cookie', value);
  }
  return headers;
}

describe('CookieJar', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should replay a host-only cookie to the same host only', () => {
    const jar = new CookieJar();
    const stored = jar.store(
      new URL('http://localhost:8069/web/session/authenticate'),
      setCookies('session_id=abc123; Path=/; HttpOnly')
    );

    expect(stored).toEqual(['session_id']);
    expect(jar.size).toBe(1);
    expect(jar.header(new URL('http://localhost:8069/web/content/1'))).toBe('session_id=abc123');
    expect(jar.header(new URL('http://localhost:9000/web'))).toBe('session_id=abc123');
    expect(jar.header(new URL('http://example.com/web'))).toBeUndefined();
  });

  it('should default the path to the directory of the request', () => {
    const jar = new CookieJar();
    jar.store(new URL('http://localhost/web/session/authenticate'), setCookies('token=t1'));

    expect(jar.header(new URL('http://localhost/web/session/get_session_info'))).toBe('token=t1');
    expect(jar.header(new URL('http://localhost/web/session'))).toBe('token=t1');
    expect(jar.header(new URL('http://localhost/web/sessions'))).toBeUndefined();
    expect(jar.header(new URL('http://localhost/web/dataset/call'))).toBeUndefined();
  });

  it('should share a domain cookie with subdomains', () => {
    const jar = new CookieJar();
    jar.store(new URL('http://erp.example.com/'), setCookies('sid=1; Domain=.example.com; Path=/'));

    expect(jar.header(new URL('http://api.example.com/x'))).toBe('sid=1');
    expect(jar.header(new URL('http://example.com/'))).toBe('sid=1');
    expect(jar.header(new URL('http://example.org/'))).toBeUndefined();
  });

  it('should ignore a cookie set for another domain', () => {
    const jar = new CookieJar();
    const stored = jar.store(
      new URL('http://erp.example.com/'),
      setCookies('sid=1; Domain=other.com; Path=/')
    );

    expect(stored).toEqual([]);
    expect(jar.size).toBe(0);
  });

  it('should send secure cookies over https only', () => {
    const jar = new CookieJar();
    jar.store(new URL('https://localhost/'), setCookies('sid=1; Path=/; Secure'));

    expect(jar.header(new URL('https://localhost/web'))).toBe('sid=1');
    expect(jar.header(new URL('http://localhost/web'))).toBeUndefined();
  });

  it('should replace a cookie with the same name, domain and path', () => {
    const jar = new CookieJar();
    const url = new URL('http://localhost/');
    jar.store(url, setCookies('sid=old; Path=/'));
    jar.store(url, setCookies('sid=new; Path=/'));

    expect(jar.size).toBe(1);
    expect(jar.header(url)).toBe('sid=new');
  });

  it('should delete a cookie set with Max-Age=0', () => {
    const jar = new CookieJar();
    const url = new URL('http://localhost/web/session/destroy');
    jar.store(url, setCookies('sid=1; Path=/'));
    jar.store(url, setCookies('sid=; Path=/; Max-Age=0'));

    expect(jar.size).toBe(0);
    expect(jar.header(url)).toBeUndefined();
  });

  it('should drop cookies once they expire', () => {
    vi.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
    const jar = new CookieJar();
    const url = new URL('http://localhost/');
    jar.store(url, setCookies('sid=1; Path=/; Max-Age=60'));

    vi.setSystemTime(new Date('2026-01-01T00:00:59Z'));
    expect(jar.header(url)).toBe('sid=1');

    vi.setSystemTime(new Date('2026-01-01T00:01:01Z'));
    expect(jar.header(url)).toBeUndefined();
    expect(jar.size).toBe(0);
  });

  it('should not store a cookie that already expired', () => {
    vi.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
    const jar = new CookieJar();
    jar.store(
      new URL('http://localhost/'),
      setCookies('sid=1; Path=/; Expires=Wed, 21 Oct 2015 07:28:00 GMT')
    );

    expect(jar.size).toBe(0);
  });

  it('should list the most specific paths first', () => {
    const jar = new CookieJar();
    jar.store(new URL('http://localhost/'), setCookies('a=1; Path=/', 'b=2; Path=/web'));

    expect(jar.header(new URL('http://localhost/web/login'))).toBe('b=2; a=1');
    expect(jar.header(new URL('http://localhost/odoo'))).toBe('a=1');
  });

  it('should forget everything on clear', () => {
    const jar = new CookieJar();
    jar.store(new URL('http://localhost/'), setCookies('a=1; Path=/', 'b=2; Path=/'));
    jar.clear();

    expect(jar.size).toBe(0);
    expect(jar.header(new URL('http://localhost/'))).toBeUndefined();
  });
});
