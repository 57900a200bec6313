import type { AppError } from './base.js';
import { createError, errorMessage } from './base.js';

export type K8sError = AppError;

export const K8sErrors = {
  KUBECONFIG_NOT_FOUND: (path?: string) =>
    createError(
      'K8S_KUBECONFIG_NOT_FOUND',
      path ? `Kubeconfig not found at: ${path}` : 'Kubeconfig not found',
      404,
      { path }
    ),

  KUBECONFIG_INVALID: (message: string) =>
    createError('K8S_KUBECONFIG_INVALID', `Invalid kubeconfig: ${message}`, 400),

  CONTEXT_NOT_FOUND: (context: string) =>
    createError('K8S_CONTEXT_NOT_FOUND', `Kubernetes context not found: ${context}`, 404, {
      context,
    }),

  CLUSTER_UNREACHABLE: (message: string) =>
    createError('K8S_CLUSTER_UNREACHABLE', `Kubernetes cluster is unreachable: ${message}`, 503),

  NOT_FOUND: (message: string) => createError('K8S_NOT_FOUND', message, 404),

  ALREADY_EXISTS: (message: string) => createError('K8S_ALREADY_EXISTS', message, 409),

  API_ERROR: (message: string, status = 500) =>
    createError('K8S_API_ERROR', message, status, { status }),

  POD_STARTUP_TIMEOUT: (podName: string, timeoutSeconds: number) =>
    createError(
      'K8S_POD_STARTUP_TIMEOUT',
      `Pod ${podName} failed to start within ${timeoutSeconds}s`,
      408,
      { podName, timeoutSeconds }
    ),

  EXEC_CONNECTION_FAILED: (podName: string, message: string) =>
    createError(
      'K8S_EXEC_CONNECTION_FAILED',
      `Failed to establish exec connection to pod ${podName}: ${message}`,
      503,
      { podName }
    ),
} as const;

/**
 * HTTP status carried by a Kubernetes client error. The 1.x client throws
 * `ApiException` with `code`; older code paths expose `statusCode`.
 */
export function kubernetesStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return kubernetesStatus(error) === 404;
}

function statusMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'string') {
      try {
        const parsed: unknown = JSON.parse(body);
        if (
          typeof parsed === 'object' &&
          parsed !== null &&
          'message' in parsed &&
          typeof parsed.message === 'string'
        ) {
          return parsed.message;
        }
      } catch {
        return body;
      }
    }
    if (
      typeof body === 'object' &&
      body !== null &&
      'message' in body &&
      typeof body.message === 'string'
    ) {
      return body.message;
    }
  }
  return errorMessage(error);
}

/** Map an error thrown by the Kubernetes client to an AppError. */
export function fromKubernetesError(error: unknown): K8sError {
  const status = kubernetesStatus(error);
  const message = statusMessage(error);
  if (status === 404) return K8sErrors.NOT_FOUND(message);
  if (status === 409) return K8sErrors.ALREADY_EXISTS(message);
  return K8sErrors.API_ERROR(message, status ?? 500);
}
