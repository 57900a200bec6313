import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { fromKubernetesError } from '../lib/errors/k8s-errors.js';
import { MonitoringErrors } from '../lib/errors/monitoring-errors.js';
import { Kinds } from '../lib/k8s/kinds.js';
import { labelSelector } from '../lib/k8s/objects.js';
import type { ClusterClient, K8sObject } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import {
  LOWERCASE_ALPHANUMERIC,
  LOWERCASE_LETTERS,
  type RandomIndex,
  randomString,
} from '../lib/utils/random.js';
import { attempt, err, ok } from '../lib/utils/result.js';
import type { DashboardConfigStore } from './dashboard-config.service.js';

const log = createLogger('Monitoring');

export const MONITORING_KEY = 'monitoring';
export const SECRET_NAME_PREFIX = 'grafana-token-';

const monitoringEntrySchema = z.object({
  name: z.string(),
  type: z.string().default('grafana'),
  endpoint: z.string(),
  token: z.string().default(''),
});

export const monitoringConfigSchema = z.object({
  monitorings: z.array(monitoringEntrySchema).nullish().transform((value) => value ?? []),
});

export type MonitoringEntry = z.infer<typeof monitoringEntrySchema>;

export const grafanaDashboardSchema = z
  .object({
    id: z.number(),
    uid: z.string(),
    title: z.string(),
    url: z.string(),
    folderId: z.number().optional(),
    folderTitle: z.string().optional(),
    type: z.string(),
  })
  .passthrough();

export type GrafanaDashboard = z.infer<typeof grafanaDashboardSchema>;

export interface MonitoringSource {
  name: string;
  type: string;
  endpoint: string;
  token?: string;
}

/** Random lowercase name part: a letter, then letters and digits. */
export function randomSuffix(length = 16, pick?: RandomIndex): string {
  return randomString(1, LOWERCASE_LETTERS, pick) + randomString(length - 1, LOWERCASE_ALPHANUMERIC, pick);
}

const isAlphanumeric = (char: string) => /^[A-Za-z0-9]$/.test(char);

/** Make a display name usable as a label value. */
export function formatLabelValue(value: string): string {
  let formatted = value.replace(/[ /\\]/g, '-');
  if (formatted.length > 0 && !isAlphanumeric(formatted.charAt(0))) formatted = `x${formatted}`;
  if (formatted.length > 0 && !isAlphanumeric(formatted.charAt(formatted.length - 1))) formatted = `${formatted}x`;
  return formatted;
}

const trimEndpoint = (endpoint: string) => endpoint.replace(/\/+$/, '');

const secretDataSchema = z
  .object({
    data: z.record(z.string()).optional(),
    stringData: z.record(z.string()).optional(),
  })
  .passthrough();

/** Token held by a Grafana secret; `data` is base64, `stringData` is plain. */
export function secretToken(secret: K8sObject): string | undefined {
  const parsed = secretDataSchema.safeParse(secret);
  if (!parsed.success) return undefined;
  const encoded = parsed.data.data?.token;
  if (encoded) return Buffer.from(encoded, 'base64').toString('utf8');
  return parsed.data.stringData?.token;
}

export interface MonitoringServiceDeps {
  config: DashboardConfigStore;
  client: () => ClusterClient;
  namespace: string;
  fetch?: typeof fetch;
  randomName?: () => string;
}

/** Grafana sources: entries in the dashboard config map, tokens in secrets. */
export class MonitoringService {
  private fetch: typeof fetch;
  private randomName: () => string;

  constructor(private deps: MonitoringServiceDeps) {
    this.fetch = deps.fetch ?? globalThis.fetch;
    this.randomName = deps.randomName ?? (() => randomSuffix());
  }

  private async entries(): Promise<Result<MonitoringEntry[], AppError>> {
    const config = await this.deps.config.read(MONITORING_KEY, monitoringConfigSchema);
    if (!config.ok) return config;
    return ok(config.value?.monitorings ?? []);
  }

  async addGrafana(input: { name: string; endpoint: string; token: string }): Promise<Result<{ message: string }, AppError>> {
    const endpoint = trimEndpoint(input.endpoint);
    const entries = await this.entries();
    if (!entries.ok) return entries;
    for (const entry of entries.value) {
      if (entry.name === input.name) return err(MonitoringErrors.DUPLICATE_NAME(input.name));
      if (trimEndpoint(entry.endpoint) === endpoint) return err(MonitoringErrors.DUPLICATE_ENDPOINT(endpoint));
    }

    const secretName = `${SECRET_NAME_PREFIX}${this.randomName()}`;
    const created = await attempt(
      () =>
        this.deps.client().create({
          apiVersion: 'v1',
          kind: 'Secret',
          type: 'Opaque',
          metadata: {
            name: secretName,
            namespace: this.deps.namespace,
            labels: {
              'app.kubernetes.io/name': 'grafana',
              'grafana.karmada.io/name': formatLabelValue(input.name),
            },
          },
          stringData: { token: input.token },
        }),
      fromKubernetesError
    );
    if (!created.ok) return created;

    const written = await this.deps.config.write(MONITORING_KEY, {
      monitorings: [...entries.value, { name: input.name, type: 'grafana', endpoint, token: secretName }],
    });
    if (!written.ok) return written;
    log.info('Grafana source added', { data: { name: input.name, endpoint } });
    return ok({ message: 'Grafana configuration added successfully' });
  }

  /** Configured sources with their tokens; a source whose secret cannot be read has none. */
  async list(): Promise<Result<{ monitorings: MonitoringSource[] }, AppError>> {
    const entries = await this.entries();
    if (!entries.ok) return entries;

    const monitorings: MonitoringSource[] = [];
    for (const entry of entries.value) {
      const source: MonitoringSource = { name: entry.name, type: entry.type, endpoint: entry.endpoint };
      const token = await this.token(entry);
      if (token.ok) source.token = token.value;
      else log.warn('Monitoring token unavailable', { data: { name: entry.name }, error: token.error.message });
      monitorings.push(source);
    }
    return ok({ monitorings });
  }

  private async token(entry: MonitoringEntry): Promise<Result<string, AppError>> {
    if (!entry.token) return err(MonitoringErrors.TOKEN_NOT_FOUND(entry.name));
    const secret = await attempt(
      () => this.deps.client().get(Kinds.secret, entry.token, this.deps.namespace),
      fromKubernetesError
    );
    if (!secret.ok) return secret;
    const token = secretToken(secret.value);
    return token ? ok(token) : err(MonitoringErrors.TOKEN_NOT_FOUND(entry.name));
  }

  async dashboards(name: string): Promise<Result<{ dashboards: GrafanaDashboard[] }, AppError>> {
    const entries = await this.entries();
    if (!entries.ok) return entries;
    const entry = entries.value.find((candidate) => candidate.name === name);
    if (!entry) return err(MonitoringErrors.SOURCE_NOT_FOUND(name));

    const token = await this.token(entry);
    if (!token.ok) return token;

    let response: Response;
    try {
      response = await this.fetch(`${trimEndpoint(entry.endpoint)}/api/search?query=&type=dash-db`, {
        headers: { Authorization: `Bearer ${token.value}` },
      });
    } catch (error) {
      return err(MonitoringErrors.GRAFANA_REQUEST_FAILED(0, errorMessage(error)));
    }
    if (!response.ok) {
      const body = await response.text();
      log.error('Grafana search failed', { data: { name, status: response.status, body } });
      return err(MonitoringErrors.GRAFANA_REQUEST_FAILED(response.status, response.statusText));
    }

    const parsed = z.array(grafanaDashboardSchema).safeParse(await response.json());
    if (!parsed.success) {
      return err(MonitoringErrors.GRAFANA_REQUEST_FAILED(response.status, 'unexpected search response'));
    }
    return ok({ dashboards: parsed.data });
  }

  /** Remove the source matching name and endpoint, then its token secrets. */
  async deleteSource(name: string, endpoint: string): Promise<Result<{ message: string }, AppError>> {
    const entries = await this.entries();
    if (!entries.ok) return entries;

    const remaining = entries.value.filter(
      (entry) => !(entry.name === name && trimEndpoint(entry.endpoint) === trimEndpoint(endpoint))
    );
    if (remaining.length === entries.value.length) return err(MonitoringErrors.SOURCE_NOT_FOUND(name));

    const written = await this.deps.config.write(MONITORING_KEY, { monitorings: remaining });
    if (!written.ok) return written;

    const client = this.deps.client();
    const selector = labelSelector({
      'app.kubernetes.io/name': 'grafana',
      'grafana.karmada.io/name': formatLabelValue(name),
    });
    const secrets = await attempt(
      () => client.list(Kinds.secret, { namespace: this.deps.namespace, labelSelector: selector }),
      fromKubernetesError
    );
    if (!secrets.ok) return secrets;
    for (const secret of secrets.value) {
      const secretName = secret.metadata?.name;
      if (!secretName) continue;
      const deleted = await attempt(
        () => client.delete(Kinds.secret, secretName, this.deps.namespace),
        fromKubernetesError
      );
      if (!deleted.ok) return deleted;
    }
    log.info('Monitoring source deleted', { data: { name, endpoint } });
    return ok({ message: 'Monitoring configuration deleted successfully' });
  }
}
