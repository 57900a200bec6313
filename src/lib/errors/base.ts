export interface AppError {
  code: string;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

export const createError = (
  code: string,
  message: string,
  status: number,
  details?: Record<string, unknown>
): AppError => ({
  code,
  message,
  status,
  details,
});

export class AppErrorClass extends Error implements AppError {
  code: string;
  status: number;
  details?: Record<string, unknown>;

  constructor(error: AppError) {
    super(error.message);
    this.name = 'AppError';
    this.code = error.code;
    this.status = error.status;
    this.details = error.details;
  }
}

export function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'status' in value &&
    typeof value.status === 'number'
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
