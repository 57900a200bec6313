import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = z.boolean().default(false);

export const clusterAccessSchema = z.object({
  kubeconfig: optionalString,
  context: optionalString,
  skipTlsVerify: flag,
});

export const keycloakConfigSchema = z.object({
  url: optionalString,
  realm: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: optionalString,
  frontendUrl: z.string().url(),
});

export const dashboardConfigSchema = z.object({
  server: z.object({
    bindAddress: z.string().ip().or(z.literal('localhost')).default('0.0.0.0'),
    port: z.coerce.number().int().min(1).max(65535).default(8000),
    corsOrigin: z.string().default('http://localhost:5173'),
  }),
  karmada: clusterAccessSchema,
  management: clusterAccessSchema,
  namespace: z.string().min(1).default('karmada-system'),
  openfga: z.object({ apiUrl: optionalString }),
  etcd: z.object({
    host: z.string().min(1).default('ml-platform-admin-etcd'),
    port: z.coerce.number().int().min(1).max(65535).default(2379),
    endpoint: optionalString,
  }),
  porch: z.object({
    apiUrl: optionalString.pipe(z.string().url().optional()),
    skipTlsVerify: flag,
  }),
  auth: z.object({
    jwtSecret: z.string().min(1).default('default-karmada-dashboard-secret-key'),
    adminPassword: z.string().min(1).default('admin123'),
  }),
  keycloak: keycloakConfigSchema,
});

export type ClusterAccessConfig = z.infer<typeof clusterAccessSchema>;
export type KeycloakConfig = z.infer<typeof keycloakConfigSchema>;
export type DashboardConfig = z.infer<typeof dashboardConfigSchema>;
