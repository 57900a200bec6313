/**
 * Dashboard configuration
 *
 * Combines command-line flags and environment variables and validates the
 * result against `dashboardConfigSchema`.
 */

import { ValidationErrors } from '../errors/validation-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { type DashboardConfig, dashboardConfigSchema } from './schemas.js';

export interface CliOptions {
  insecureBindAddress?: string;
  insecurePort?: string | number;
  karmadaKubeconfig?: string;
  karmadaContext?: string;
  skipKarmadaApiserverTlsVerify?: boolean;
  kubeconfig?: string;
  context?: string;
  skipKubeApiserverTlsVerify?: boolean;
  namespace?: string;
  openfgaApiUrl?: string;
  etcdHost?: string;
  etcdPort?: string | number;
  porchApiUrl?: string;
  skipPorchTlsVerify?: boolean;
}

export const DEFAULT_FRONTEND_URL = 'http://localhost:32000';

function keycloakRealm(env: NodeJS.ProcessEnv): string {
  if (env.KEYCLOAK_REALM) return env.KEYCLOAK_REALM;
  return env.ENV_NAME === 'dev' ? 'ml-platform-dev' : 'ml-platform';
}

export function loadConfig(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): Result<DashboardConfig, ReturnType<typeof ValidationErrors.VALIDATION_ERROR>> {
  const raw = {
    server: {
      bindAddress: cli.insecureBindAddress,
      port: cli.insecurePort,
      corsOrigin: env.CORS_ORIGIN,
    },
    karmada: {
      kubeconfig: cli.karmadaKubeconfig,
      context: cli.karmadaContext,
      skipTlsVerify: cli.skipKarmadaApiserverTlsVerify,
    },
    management: {
      kubeconfig: cli.kubeconfig,
      context: cli.context,
      skipTlsVerify: cli.skipKubeApiserverTlsVerify,
    },
    namespace: cli.namespace,
    openfga: { apiUrl: cli.openfgaApiUrl },
    etcd: {
      host: cli.etcdHost,
      port: cli.etcdPort,
      endpoint: env.ETCD_ENDPOINT,
    },
    porch: {
      apiUrl: cli.porchApiUrl,
      skipTlsVerify: cli.skipPorchTlsVerify,
    },
    auth: {
      jwtSecret: env.KARMADA_DASHBOARD_JWT_SECRET || undefined,
      adminPassword: env.KARMADA_DASHBOARD_ADMIN_PASSWORD || undefined,
    },
    keycloak: {
      url: env.KEYCLOAK_URL,
      realm: keycloakRealm(env),
      clientId: env.KEYCLOAK_CLIENT_ID || 'ml-platform-admin',
      clientSecret: env.KEYCLOAK_CLIENT_SECRET,
      frontendUrl: env.FRONTEND_URL || DEFAULT_FRONTEND_URL,
    },
  };

  const parsed = dashboardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return err(ValidationErrors.VALIDATION_ERROR(parsed.error.issues));
  }
  return ok(parsed.data);
}
