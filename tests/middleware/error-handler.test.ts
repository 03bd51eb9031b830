import { describe, it, expect, beforeEach } from 'vitest';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import { NotFoundError, UpstreamError, ValidationError } from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

const ctx: HandlerContext = { requestId: 'req-1' };

function throwing(err: unknown): Handler {
  return async () => {
    throw err;
  };
}

describe('errorHandler middleware', () => {
  let logProvider: ConsoleLogProvider;
  let errorHandler: ReturnType<typeof createErrorHandler>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    errorHandler = createErrorHandler(logProvider);
  });

  it('should pass through successful responses', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });
    const res = await errorHandler(handler)(new Request('http://test'), ctx);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('should map ValidationError to 400 with details', async () => {
    const res = await errorHandler(
      throwing(new ValidationError('claimDescription is required', { field: 'claimDescription' }))
    )(new Request('http://test'), ctx);

    expect(res.status).toBe(400);
    expect(res.headers.get('Content-Type')).toBe('application/json');
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'claimDescription is required',
        details: { field: 'claimDescription' },
      },
    });
  });

  it('should map NotFoundError to 404 without details', async () => {
    const res = await errorHandler(throwing(new NotFoundError('No such route')))(
      new Request('http://test'),
      ctx
    );

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'No such route' },
    });
  });

  it('should map UpstreamError to 502', async () => {
    const res = await errorHandler(
      throwing(new UpstreamError('Decision generation failed', { attempts: 3 }))
    )(new Request('http://test'), ctx);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: {
        code: 'UPSTREAM_FAILURE',
        message: 'Decision generation failed',
        details: { attempts: 3 },
      },
    });
    expect(logProvider.events).toHaveLength(0);
  });

  it('should hide unknown errors behind a 500 and log them', async () => {
    const res = await errorHandler(throwing(new Error('connection string leaked')))(
      new Request('http://test'),
      ctx
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      message: 'Unhandled error',
      fields: { requestId: 'req-1', error: 'connection string leaked' },
    });
  });

  it('should handle non-Error throws', async () => {
    const res = await errorHandler(throwing('plain string'))(new Request('http://test'), ctx);

    expect(res.status).toBe(500);
    expect(logProvider.events[0]?.fields).toMatchObject({ error: 'plain string' });
  });
});
