import { createError } from './base.js';

export const TerminalErrors = {
  MISSING_PARAMS: createError(
    'TERMINAL_MISSING_PARAMS',
    'namespace and pod parameters are required',
    400
  ),
  MISSING_NODE: createError('TERMINAL_MISSING_NODE', 'node parameter is required', 400),
  INVALID_CLUSTER: createError('TERMINAL_INVALID_CLUSTER', 'cluster parameter is required', 400),
  POD_NOT_FOUND: (namespace: string, pod: string) =>
    createError('TERMINAL_POD_NOT_FOUND', `Pod ${namespace}/${pod} not found`, 404),
  NO_CONTAINERS: (namespace: string, pod: string) =>
    createError('TERMINAL_NO_CONTAINERS', `No containers found in pod ${namespace}/${pod}`, 400),
  CONTAINER_NOT_FOUND: (container: string, namespace: string, pod: string) =>
    createError(
      'TERMINAL_CONTAINER_NOT_FOUND',
      `Container ${container} not found in pod ${namespace}/${pod}`,
      404
    ),
  SHELL_POD_NOT_RUNNING: (pod: string, reason: string) =>
    createError('TERMINAL_SHELL_POD_NOT_RUNNING', `Pod ${pod} not running in time: ${reason}`, 504),
} as const;
