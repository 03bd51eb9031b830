/**
 * Typed readers for request bodies that validateBody has already checked.
 * They narrow instead of casting, so a schema/handler mismatch surfaces as a
 * ValidationError rather than a wrongly-typed value.
 */

import { ValidationError } from '../errors.js';

export type Body = Record<string, unknown>;

export async function readBody(req: Request): Promise<Body> {
  const body: unknown = await req.json();
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');
  return body;
}

export function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number`);
  }
  return value;
}

export function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new ValidationError(`${field} must be a boolean`);
  return value;
}

export function optionalStringArray(body: Body, field: string): string[] | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new ValidationError(`${field} must be an array of strings`);

  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') throw new ValidationError(`${field} must be an array of strings`);
    strings.push(item);
  }
  return strings;
}

/** A structured object or a free-text string. */
export function objectOrString(body: Body, field: string): Body | string {
  const value = body[field];
  if (typeof value === 'string' || isRecord(value)) return value;
  throw new ValidationError(`${field} must be an object or a string`);
}

export function optionalRecord(body: Body, field: string): Body | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw new ValidationError(`${field} must be an object`);
  return value;
}

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
