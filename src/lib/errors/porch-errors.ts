import { createError } from './base.js';

export const PorchErrors = {
  NOT_CONFIGURED: createError('PORCH_NOT_CONFIGURED', 'Porch API is not configured', 500),
  TOKEN_FAILED: (message: string) =>
    createError('PORCH_TOKEN_FAILED', `failed to obtain service account token: ${message}`, 500),
  UPSTREAM_FAILED: (message: string) =>
    createError('PORCH_UPSTREAM_FAILED', `Porch request failed: ${message}`, 502),
} as const;
