import type { AppError } from '../errors/base.js';

/**
 * Envelope shared by every dashboard route. Failures from `failure` keep
 * HTTP 200 and carry the error status in `code`.
 */
export type Envelope<T> = {
  code: number;
  message: string;
  data: T;
};

export const success = <T>(data: T): Envelope<T> => ({
  code: 200,
  message: 'success',
  data,
});

export const failure = (error: Pick<AppError, 'message'> & { status?: number }): Envelope<Record<string, never>> => ({
  code: error.status ?? 500,
  message: error.message,
  data: {},
});

export const failureWithStatus = (status: number, message: string): Envelope<null> => ({
  code: status,
  message,
  data: null,
});

/** JSON response with any status; `c.json` only takes literal status codes. */
export function json<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
