/**
 * Application error hierarchy.
 * Each AppError carries an HTTP status and a stable error code so the
 * error-handler middleware can map it to a structured response.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input rejected before any processing. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'INVALID_REQUEST', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * A collaborator the pipeline cannot proceed without (e.g. the grounded
 * decision call) failed after its retries.
 */
export class UpstreamError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(502, 'UPSTREAM_FAILURE', message, details);
  }
}

/** Invalid or missing configuration. Raised at startup, never per request. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
