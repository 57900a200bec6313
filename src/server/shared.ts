/**
 * Shared helpers for API routes
 */

import type { Context } from 'hono';
import type { AuthUser } from '../lib/api/auth-middleware.js';
import { failure, failureWithStatus, json, success } from '../lib/api/response.js';
import { describeIssues } from '../lib/api/validation.js';
import type { AppError } from '../lib/errors/base.js';
import { AuthErrors } from '../lib/errors/auth-errors.js';
import type { ValidationError } from '../lib/errors/validation-errors.js';
import { type DataSelectQuery, parseDataSelect } from '../lib/k8s/dataselect.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

/** Envelope for a service result; failures keep HTTP 200. */
export function respond<T>(c: Context, result: Result<T, AppError>): Response {
  return result.ok ? c.json(success(result.value)) : c.json(failure(result.error));
}

/** Failure envelope with the error's status on the HTTP response as well. */
export function respondWithStatus(error: Pick<AppError, 'status' | 'message'>): Response {
  return json(failureWithStatus(error.status, error.message), error.status);
}

export function validationFailure(c: Context, error: ValidationError): Response {
  return c.json(failure({ status: error.status, message: describeIssues(error) }));
}

export function dataSelect(c: Context): DataSelectQuery {
  return parseDataSelect(c.req.query());
}

export function requireUser(c: Context): Result<AuthUser, AppError> {
  const user = c.get('user');
  return user ? ok(user) : err(AuthErrors.UNAUTHENTICATED);
}

/** Request body as raw bytes, or undefined for bodiless methods. */
export async function rawBody(c: Context): Promise<Uint8Array | undefined> {
  if (c.req.method === 'GET' || c.req.method === 'HEAD') return undefined;
  const buffer = await c.req.arrayBuffer();
  return buffer.byteLength > 0 ? new Uint8Array(buffer) : undefined;
}
