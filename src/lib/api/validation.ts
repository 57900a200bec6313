import type { z } from 'zod';
import { ValidationErrors } from '../errors/validation-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

type ValidationFailure = ReturnType<typeof ValidationErrors.VALIDATION_ERROR>;

export const parseBody = async <T>(
  request: Request,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T, ValidationFailure>> => {
  let body: unknown;
  try {
    body = await request.json();
  } catch (error) {
    return err(ValidationErrors.VALIDATION_ERROR([{ path: ['body'], message: String(error) }]));
  }
  return parseValue(body, schema);
};

const parseValue = <T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ValidationFailure> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return err(ValidationErrors.VALIDATION_ERROR(parsed.error.issues));
  }
  return ok(parsed.data);
};

/** One-line summary of a validation failure, for envelope messages. */
export const describeIssues = (error: ValidationFailure): string => {
  const raw = error.details?.errors;
  const issues: unknown[] = Array.isArray(raw) ? raw : [];
  const parts = issues.flatMap((issue) => {
    if (typeof issue !== 'object' || issue === null) return [];
    const path = 'path' in issue && typeof issue.path === 'string' ? issue.path : '';
    const message = 'message' in issue && typeof issue.message === 'string' ? issue.message : '';
    return [path ? `${path}: ${message}` : message];
  });
  return parts.length > 0 ? parts.join('; ') : error.message;
};
