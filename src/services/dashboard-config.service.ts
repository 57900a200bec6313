import * as yaml from 'yaml';
import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { fromKubernetesError, isNotFound } from '../lib/errors/k8s-errors.js';
import { MonitoringErrors } from '../lib/errors/monitoring-errors.js';
import { Kinds } from '../lib/k8s/kinds.js';
import type { ClusterClient, K8sObject } from '../lib/k8s/types.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

export const CONFIG_MAP_NAME = 'ml-platform-admin-configmap';

const configMapDataSchema = z.object({ data: z.record(z.string()).default({}) }).passthrough();

/**
 * YAML documents kept under keys of the dashboard config map on the
 * management cluster. Writes create the config map when it is missing.
 */
export class DashboardConfigStore {
  constructor(
    private client: () => ClusterClient,
    private namespace: string
  ) {}

  private async load(): Promise<Result<K8sObject | null, AppError>> {
    try {
      return ok(await this.client().get(Kinds.configMap, CONFIG_MAP_NAME, this.namespace));
    } catch (error) {
      if (isNotFound(error)) return ok(null);
      return err(fromKubernetesError(error));
    }
  }

  /** Parsed document at `key`; null when the config map or key is absent. */
  async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T | null, AppError>> {
    const configMap = await this.load();
    if (!configMap.ok) return configMap;
    if (!configMap.value) return ok(null);

    const data = configMapDataSchema.safeParse(configMap.value);
    const raw = data.success ? data.data.data[key] : undefined;
    if (!raw) return ok(null);

    let document: unknown;
    try {
      document = yaml.parse(raw);
    } catch (error) {
      return err(MonitoringErrors.INVALID_CONFIG(`${key}: ${errorMessage(error)}`));
    }
    const parsed = schema.safeParse(document ?? {});
    if (!parsed.success) return err(MonitoringErrors.INVALID_CONFIG(`${key}: ${parsed.error.issues[0]?.message ?? 'invalid'}`));
    return ok(parsed.data);
  }

  async write(key: string, document: unknown): Promise<Result<void, AppError>> {
    const configMap = await this.load();
    if (!configMap.ok) return configMap;

    const serialised = yaml.stringify(document);
    try {
      if (!configMap.value) {
        await this.client().create({
          apiVersion: 'v1',
          kind: 'ConfigMap',
          metadata: { name: CONFIG_MAP_NAME, namespace: this.namespace },
          data: { [key]: serialised },
        });
        return ok(undefined);
      }
      const current = configMapDataSchema.safeParse(configMap.value);
      const data = current.success ? current.data.data : {};
      await this.client().replace({ ...configMap.value, data: { ...data, [key]: serialised } });
      return ok(undefined);
    } catch (error) {
      return err(fromKubernetesError(error));
    }
  }
}
