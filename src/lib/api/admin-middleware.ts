import type { Context, Next } from 'hono';
import type { AppError } from '../errors/base.js';
import { AuthErrors } from '../errors/auth-errors.js';
import { createLogger } from '../logging/logger.js';
import type { Result } from '../utils/result.js';
import type { AuthUser } from './auth-middleware.js';
import { failureWithStatus, json } from './response.js';

const log = createLogger('AdminMiddleware');

export interface AdminCheck {
  /** Roles that grant admin on their own, such as Keycloak realm roles. */
  hasAdminRole(roles: string[]): boolean;
  /** Relation-store admin check; null when authorization is not configured. */
  isDashboardAdmin: ((username: string) => Promise<Result<boolean, AppError>>) | null;
}

function reject(error: AppError) {
  return json(failureWithStatus(error.status, error.message), error.status);
}

/** Admits dashboard administrators only. */
export function adminMiddleware(check: AdminCheck) {
  return async (c: Context, next: Next) => {
    const user: AuthUser | undefined = c.get('user');
    if (!user) return reject(AuthErrors.UNAUTHENTICATED);
    if (check.hasAdminRole(user.roles)) return next();

    if (!check.isDashboardAdmin) return reject(AuthErrors.AUTHZ_UNAVAILABLE);
    const admin = await check.isDashboardAdmin(user.username);
    if (!admin.ok) {
      log.error('Admin check failed', { requestId: c.get('requestId'), data: { username: user.username }, error: admin.error.message });
      return reject(admin.error);
    }
    if (!admin.value) {
      log.warn('Management access denied', { requestId: c.get('requestId'), data: { username: user.username } });
      return reject(AuthErrors.ADMIN_REQUIRED);
    }
    return next();
  };
}
