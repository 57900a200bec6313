/**
 * Authentication middleware for API routes
 *
 * Extracts the bearer token, resolves it to an `AuthUser` and stores it on
 * the request context. Public paths pass through untouched.
 *
 * @module lib/api/auth-middleware
 */

import type { Context, Next } from 'hono';
import type { AppError } from '../errors/base.js';
import { AuthErrors } from '../errors/auth-errors.js';
import type { Result } from '../utils/result.js';
import { failureWithStatus } from './response.js';

/**
 * Authenticated caller available in routes
 */
export interface AuthUser {
  username: string;
  role: string;
  source: 'jwt' | 'keycloak';
  /** Keycloak realm and client roles; empty for dashboard tokens. */
  roles: string[];
}

export interface Authenticator {
  authenticate(token: string): Promise<Result<AuthUser, AppError>>;
}

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    user: AuthUser | undefined;
    memberCluster: string | undefined;
  }
}

export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || undefined;
}

export interface AuthMiddlewareOptions {
  /** Paths served without a token. Entries ending in `*` match by prefix. */
  publicPaths?: string[];
}

function isPublic(path: string, publicPaths: string[]): boolean {
  return publicPaths.some((entry) =>
    entry.endsWith('*') ? path.startsWith(entry.slice(0, -1)) : path === entry
  );
}

export function authMiddleware(authenticator: Authenticator, options: AuthMiddlewareOptions = {}) {
  const publicPaths = options.publicPaths ?? [];

  return async (c: Context, next: Next) => {
    if (c.req.method === 'OPTIONS' || isPublic(c.req.path, publicPaths)) {
      return next();
    }

    // WebSocket clients cannot set headers and pass the token as a query parameter.
    const token = bearerToken(c.req.header('Authorization')) ?? (c.req.query('token') || undefined);
    if (!token) {
      return c.json(failureWithStatus(401, AuthErrors.MISSING_TOKEN.message), 401);
    }

    const result = await authenticator.authenticate(token);
    if (!result.ok) {
      return c.json(failureWithStatus(401, result.error.message), 401);
    }

    c.set('user', result.value);
    return next();
  };
}
