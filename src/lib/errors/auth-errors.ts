import { createError } from './base.js';

export const AuthErrors = {
  MISSING_TOKEN: createError('AUTH_MISSING_TOKEN', 'Missing authentication token', 401),
  INVALID_TOKEN: createError('AUTH_INVALID_TOKEN', 'Invalid authentication token', 401),
  TOKEN_VALIDATION_FAILED: createError('AUTH_TOKEN_VALIDATION_FAILED', 'Token validation failed', 401),
  INVALID_CREDENTIALS: createError('AUTH_INVALID_CREDENTIALS', 'Invalid username or password', 401),
  NO_AUTH_METHOD: createError(
    'AUTH_NO_METHOD',
    'No valid authentication method provided',
    400
  ),
  LOGIN_TIMEOUT: createError('AUTH_LOGIN_TIMEOUT', 'Authentication timed out', 401),
  PASSWORD_AUTH_DISABLED: createError(
    'AUTH_PASSWORD_DISABLED',
    'Password authentication is not available',
    401
  ),
  UNAUTHENTICATED: createError('AUTH_UNAUTHENTICATED', 'Authentication required', 401),
  ADMIN_REQUIRED: createError(
    'AUTH_ADMIN_REQUIRED',
    'Administrator permissions required for management cluster access',
    403
  ),
  INSUFFICIENT_PRIVILEGES: createError(
    'AUTH_INSUFFICIENT_PRIVILEGES',
    'insufficient privileges: admin role required',
    403
  ),
  AUTHZ_UNAVAILABLE: createError(
    'AUTHZ_UNAVAILABLE',
    'Authorization service is not available',
    500
  ),
  PERMISSION_CHECK_FAILED: (message: string) =>
    createError('AUTHZ_CHECK_FAILED', `failed to check permissions: ${message}`, 500),
  RELATION_WRITE_FAILED: (message: string) =>
    createError('AUTHZ_WRITE_FAILED', `failed to update permissions: ${message}`, 500),
  KEYCLOAK_NOT_CONFIGURED: createError(
    'KEYCLOAK_NOT_CONFIGURED',
    'Keycloak authentication not configured',
    500
  ),
  KEYCLOAK_INVALID_TOKEN: createError('KEYCLOAK_INVALID_TOKEN', 'Invalid or expired token', 401),
  SERVICE_ACCOUNT_TOKEN_INVALID: (message: string) =>
    createError('AUTH_SA_TOKEN_INVALID', `invalid service account token: ${message}`, 400),
} as const;
