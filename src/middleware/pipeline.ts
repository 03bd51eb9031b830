/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import { randomUUID } from 'node:crypto';

export interface HandlerContext {
  /** Correlation id for logs and the X-Request-Id response header. */
  requestId: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

const MAX_REQUEST_ID_LENGTH = 128;

/** Context for an incoming request, reusing a caller-supplied X-Request-Id. */
export function createContext(req: Request): HandlerContext {
  const supplied = req.headers.get('X-Request-Id')?.trim();
  const requestId =
    supplied && supplied.length <= MAX_REQUEST_ID_LENGTH ? supplied : randomUUID();
  return { requestId };
}

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
