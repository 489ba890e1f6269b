import { describe, expect, it } from 'vitest';
import { ConfigurationError, ConnectorError } from '../src/errors.js';
import { ProxyHTTP } from '../src/proxy-http.js';
import { FakeTransport } from './fake-transport.js';

const config = { host: 'localhost', port: 8069, ssl: false };

describe('ProxyHTTP', () => {
  it('should GET a path relative to the server root', async () => {
    const transport = new FakeTransport().reply('%PDF-1.4', 200, {
      'content-type': 'application/pdf',
    });
    const proxy = new ProxyHTTP(transport, config);

    const response = await proxy.get('/report/pdf/sale.report_saleorder/1');

    const [request] = transport.requests;
    expect(request?.method).toBe('GET');
    expect(request?.url.href).toBe('http://localhost:8069/report/pdf/sale.report_saleorder/1');
    expect(request?.body).toBeUndefined();
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/pdf');
    expect(response.body.toString()).toBe('%PDF-1.4');
  });

  it('should POST when a body is given', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);

    await proxy.request('/web/binary/upload', {
      body: 'csrf_token=x',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    const [request] = transport.requests;
    expect(request?.method).toBe('POST');
    expect(request?.body).toBe('csrf_token=x');
    expect(request?.headers).toEqual({ 'Content-Type': 'application/x-www-form-urlencoded' });
  });

  it('should send binary bodies as they are', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);
    const bytes = new Uint8Array([0, 1, 2, 255]);

    await proxy.post('/web/binary/upload_attachment', bytes);

    expect(transport.requests[0]?.body).toBe(bytes);
    expect(transport.requests[0]?.headers).toBeUndefined();
  });

  it('should accept an absolute URL on the server origin', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);

    await proxy.get('http://localhost:8069/web/login?redirect=%2Fodoo');

    expect(transport.requests[0]?.url.href).toBe('http://localhost:8069/web/login?redirect=%2Fodoo');
  });

  it('should refuse a protocol-relative URL to another host', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, { ...config, ssl: true });

    await expect(proxy.get('//evil.example/steal')).rejects.toThrow(
      "The path '//evil.example/steal' is not on https://localhost:8069."
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('should refuse a plain http URL on an ssl proxy', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, { ...config, ssl: true });

    await expect(proxy.get('http://localhost:8069/web')).rejects.toBeInstanceOf(ConfigurationError);
    expect(transport.requests).toHaveLength(0);
  });

  it('should send string bodies as a form by default', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);

    await proxy.post('/web/login', 'login=admin&password=test-secret');

    expect(transport.requests[0]?.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  });

  it('should keep the content type given by the caller', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);

    await proxy.post('/web/import', 'name\nAzure', { 'content-type': 'text/csv' });

    expect(transport.requests[0]?.headers).toEqual({ 'content-type': 'text/csv' });
  });

  it('should return error statuses without raising', async () => {
    const transport = new FakeTransport().reply('Not Found', 404);
    const proxy = new ProxyHTTP(transport, config);

    const response = await proxy.get('/web/content/999');

    expect(response.status).toBe(404);
    expect(response.body.toString()).toBe('Not Found');
  });

  it('should refuse a GET with a body', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, config);

    await expect(proxy.request('/web/login', { method: 'GET', body: 'x' })).rejects.toBeInstanceOf(
      ConnectorError
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('should use https when ssl is set', async () => {
    const transport = new FakeTransport();
    const proxy = new ProxyHTTP(transport, { ...config, ssl: true, port: 443 });

    await proxy.get('/web/login');

    expect(transport.requests[0]?.url.href).toBe('https://localhost/web/login');
  });
});
