import { createError } from './base.js';

export const SettingErrors = {
  NOT_FOUND: (username: string) =>
    createError('SETTING_NOT_FOUND', `user setting not found for ${username}`, 404, { username }),
  PASSWORD_REQUIRED: createError('SETTING_PASSWORD_REQUIRED', 'password is required', 400),
  INVALID_ROLE: (role: string) =>
    createError('SETTING_INVALID_ROLE', `invalid role: ${role}, must be admin or basic_user`, 400, {
      role,
    }),
  PRIVILEGE_REQUIRED: createError(
    'SETTING_PRIVILEGE_REQUIRED',
    'changing roles or cluster permissions requires the admin role',
    403
  ),
  USER_NOT_FOUND: (username: string) =>
    createError('USER_NOT_FOUND', `user ${username} not found`, 404, { username }),
  USER_EXISTS: (username: string) =>
    createError('USER_EXISTS', `user ${username} already exists`, 409, { username }),
  STORE_UNAVAILABLE: createError('USER_STORE_UNAVAILABLE', 'user store is not available', 503),
  STORE_ERROR: (message: string) => createError('USER_STORE_ERROR', message, 500),
} as const;
