import { createError } from './base.js';

export const MonitoringErrors = {
  DUPLICATE_NAME: (name: string) =>
    createError('MONITORING_DUPLICATE_NAME', `monitoring source with name '${name}' already exists`, 409, {
      name,
    }),
  DUPLICATE_ENDPOINT: (endpoint: string) =>
    createError(
      'MONITORING_DUPLICATE_ENDPOINT',
      `monitoring source with endpoint '${endpoint}' already exists`,
      409,
      { endpoint }
    ),
  SOURCE_NOT_FOUND: (name: string) =>
    createError('MONITORING_SOURCE_NOT_FOUND', `monitoring source '${name}' not found`, 404, { name }),
  TOKEN_NOT_FOUND: (name: string) =>
    createError('MONITORING_TOKEN_NOT_FOUND', `token for monitoring source '${name}' not found`, 404, {
      name,
    }),
  GRAFANA_REQUEST_FAILED: (status: number, message: string) =>
    createError('GRAFANA_REQUEST_FAILED', `grafana request failed (${status}): ${message}`, 502, {
      status,
    }),
  DASHBOARD_EXISTS: (name: string) =>
    createError('DASHBOARD_EXISTS', `dashboard with name '${name}' already exists`, 409, { name }),
  DASHBOARD_NOT_FOUND: (name: string, url: string) =>
    createError(
      'DASHBOARD_NOT_FOUND',
      `dashboard with name '${name}' and url '${url}' not found`,
      404,
      { name, url }
    ),
  INVALID_CONFIG: (message: string) =>
    createError('MONITORING_INVALID_CONFIG', `invalid monitoring configuration: ${message}`, 500),
} as const;
