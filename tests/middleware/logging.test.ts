import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

const ctx: HandlerContext = { requestId: 'req-1' };

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  it('should log a successful request at info', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ status: 'ok' }), { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/health'), ctx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/health',
      status: 200,
      requestId: 'req-1',
    });
    expect(logProvider.events[0]?.message).toMatch(/^GET \/api\/v1\/health → 200 \(\d+ms\)$/);
  });

  it('should echo the request id in the response header', async () => {
    const handler: Handler = async () =>
      new Response('{}', { status: 201, headers: { 'Content-Type': 'application/json' } });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/policies'), ctx);

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Request-Id')).toBe('req-1');
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(await response.text()).toBe('{}');
  });

  it('should log 4xx responses at warn', async () => {
    const handler: Handler = async () => new Response('{}', { status: 400 });
    await middleware(handler)(makeRequest('POST', '/api/v1/claims'), ctx);
    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 400 });
  });

  it('should log 5xx responses at error', async () => {
    const handler: Handler = async () => new Response('{}', { status: 502 });
    await middleware(handler)(makeRequest('POST', '/api/v1/claims'), ctx);
    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 502 });
  });

  it('should log and re-throw handler exceptions', async () => {
    const handler: Handler = async () => {
      throw new Error('kaboom');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/risk'), ctx)
    ).rejects.toThrow('kaboom');

    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      path: '/api/v1/risk',
      requestId: 'req-1',
      fields: { error: 'kaboom' },
    });
  });

  it('should log the path without the query string', async () => {
    const handler: Handler = async () => new Response('{}');
    await middleware(handler)(makeRequest('GET', '/api/v1/health?verbose=1'), ctx);
    expect(logProvider.events[0]).toMatchObject({ path: '/api/v1/health' });
  });
});
