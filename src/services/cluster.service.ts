import type { V1ObjectMeta } from '@kubernetes/client-node';
import { z } from 'zod';
import type { AuthUser } from '../lib/api/auth-middleware.js';
import type { AppError } from '../lib/errors/base.js';
import { AuthErrors } from '../lib/errors/auth-errors.js';
import { ClusterErrors } from '../lib/errors/cluster-errors.js';
import { fromKubernetesError, isNotFound } from '../lib/errors/k8s-errors.js';
import { applyDataSelect, type DataSelectQuery } from '../lib/k8s/dataselect.js';
import { Kinds } from '../lib/k8s/kinds.js';
import { fraction, parseQuantity } from '../lib/k8s/quantity.js';
import { type ClusterConnector, type K8sObject, MGMT_CLUSTER_NAME } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { attempt, err, ok } from '../lib/utils/result.js';
import { type AuthorizationService, type ClusterRelation, clusterRelationFor } from './authorization.service.js';
import { hasAdminRole } from './keycloak.service.js';
import type { UserStoreService } from './user-store.service.js';

const log = createLogger('ClusterService');

export const DELETE_POLL_INTERVAL_MS = 1000;
export const DELETE_TIMEOUT_MS = 60_000;

const resourceListSchema = z.record(z.union([z.string(), z.number()])).default({});

const clusterSchema = z.object({
  metadata: z.custom<V1ObjectMeta>((value) => typeof value === 'object' && value !== null).default({}),
  spec: z.object({ syncMode: z.string().default('') }).passthrough().default({}),
  status: z
    .object({
      kubernetesVersion: z.string().default(''),
      conditions: z.array(z.object({ type: z.string(), status: z.string() }).passthrough()).default([]),
      nodeSummary: z
        .object({ totalNum: z.number().default(0), readyNum: z.number().default(0) })
        .default({}),
      resourceSummary: z
        .object({ allocatable: resourceListSchema, allocated: resourceListSchema })
        .passthrough()
        .default({}),
    })
    .passthrough()
    .default({}),
});

export type ParsedCluster = z.infer<typeof clusterSchema>;

export interface AllocatedResources {
  cpuCapacity: number;
  cpuFraction: number;
  memoryCapacity: number;
  memoryFraction: number;
  allocatedPods: number;
  podCapacity: number;
  podFraction: number;
}

export interface ClusterDto {
  objectMeta: V1ObjectMeta;
  typeMeta: { kind: 'cluster' };
  ready: 'True' | 'False' | 'Unknown';
  kubernetesVersion: string;
  syncMode: string;
  nodeSummary: { totalNum: number; readyNum: number };
  allocatedResources: AllocatedResources;
}

export interface ClusterList {
  listMeta: { totalItems: number };
  clusters: ClusterDto[];
  errors: string[];
}

export interface ClusterUser {
  username: string;
  displayName: string;
  email: string;
  roles: string[];
}

export interface ClusterUpdate {
  labels?: Array<{ key: string; value: string }>;
  taints?: Array<{ key: string; value?: string; effect: string }>;
}

export function parseCluster(object: K8sObject): ParsedCluster {
  const parsed = clusterSchema.safeParse(object);
  return parsed.success ? parsed.data : clusterSchema.parse({ metadata: object.metadata ?? {} });
}

/** Status of the `Ready` condition, `Unknown` when the cluster reports none. */
export function readyStatus(cluster: ParsedCluster): ClusterDto['ready'] {
  const condition = cluster.status.conditions.find((entry) => entry.type === 'Ready');
  if (condition?.status === 'True') return 'True';
  if (condition?.status === 'False') return 'False';
  return 'Unknown';
}

export const isReady = (object: K8sObject) => readyStatus(parseCluster(object)) === 'True';

export function toClusterDto(object: K8sObject): ClusterDto {
  const cluster = parseCluster(object);
  const { allocatable, allocated } = cluster.status.resourceSummary;
  const cpuCapacity = parseQuantity(allocatable.cpu);
  const memoryCapacity = parseQuantity(allocatable.memory);
  const podCapacity = parseQuantity(allocatable.pods);
  const allocatedPods = parseQuantity(allocated.pods);

  return {
    objectMeta: cluster.metadata,
    typeMeta: { kind: 'cluster' },
    ready: readyStatus(cluster),
    kubernetesVersion: cluster.status.kubernetesVersion,
    syncMode: cluster.spec.syncMode,
    nodeSummary: cluster.status.nodeSummary,
    allocatedResources: {
      cpuCapacity,
      cpuFraction: fraction(parseQuantity(allocated.cpu), cpuCapacity),
      memoryCapacity,
      memoryFraction: fraction(parseQuantity(allocated.memory), memoryCapacity),
      allocatedPods,
      podCapacity,
      podFraction: fraction(allocatedPods, podCapacity),
    },
  };
}

/** Synthetic entry for the management cluster, which Karmada does not register. */
export function managementClusterObject(now: Date = new Date()): K8sObject {
  return {
    apiVersion: 'cluster.karmada.io/v1alpha1',
    kind: 'Cluster',
    metadata: {
      name: MGMT_CLUSTER_NAME,
      labels: { management: 'true' },
      creationTimestamp: now,
    },
    spec: { syncMode: 'Push' },
    status: {
      kubernetesVersion: 'v1.27.0',
      conditions: [{ type: 'Ready', status: 'True', reason: 'MgmtClusterReady', message: 'Management cluster is ready' }],
      nodeSummary: { totalNum: 3, readyNum: 3 },
      resourceSummary: {
        allocatable: { cpu: '4000m', memory: '8Gi', pods: '110' },
        allocated: { cpu: '1600m', memory: '4Gi', pods: '30' },
      },
    },
  };
}

const dtoFields = (dto: ClusterDto) => {
  const created = dto.objectMeta.creationTimestamp;
  return {
    name: dto.objectMeta.name ?? '',
    namespace: '',
    creationTimestamp: created ? new Date(created).getTime() : 0,
  };
};

export interface ClusterServiceDeps {
  connector: ClusterConnector;
  authz?: AuthorizationService | null;
  users?: UserStoreService | null;
  sleep?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
  deleteTimeoutMs?: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ClusterService {
  private sleep: (ms: number) => Promise<void>;

  constructor(private deps: ClusterServiceDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  private get karmada() {
    return this.deps.connector.karmada();
  }

  async listObjects(): Promise<Result<K8sObject[], AppError>> {
    return attempt(() => this.karmada.list(Kinds.cluster), fromKubernetesError);
  }

  async readyClusterNames(): Promise<Result<string[], AppError>> {
    const clusters = await this.listObjects();
    if (!clusters.ok) return clusters;
    return ok(clusters.value.filter(isReady).flatMap((cluster) => (cluster.metadata?.name ? [cluster.metadata.name] : [])));
  }

  /** Keycloak admins and OpenFGA dashboard admins; a failing check counts as not admin. */
  async isAdmin(user: AuthUser): Promise<boolean> {
    if (hasAdminRole(user.roles)) return true;
    const authz = this.deps.authz;
    if (!authz) return false;
    const admin = await authz.isDashboardAdmin(user.username);
    if (!admin.ok) {
      log.warn('Admin check failed', { data: { username: user.username }, error: admin.error.message });
      return false;
    }
    return admin.value;
  }

  async list(user: AuthUser | undefined, query: DataSelectQuery): Promise<Result<ClusterList, AppError>> {
    const clusters = await this.listObjects();
    if (!clusters.ok) return clusters;

    const visible = await this.visibleClusters(user, clusters.value);
    const selected = applyDataSelect(visible.map(toClusterDto), query, dtoFields);
    return ok({ listMeta: { totalItems: selected.totalItems }, clusters: selected.items, errors: [] });
  }

  private async visibleClusters(user: AuthUser | undefined, clusters: K8sObject[]): Promise<K8sObject[]> {
    const authz = this.deps.authz;
    if (!authz || !user) return clusters;
    if (await this.isAdmin(user)) return [managementClusterObject(), ...clusters];

    const visible: K8sObject[] = [];
    for (const cluster of clusters) {
      const name = cluster.metadata?.name;
      if (!name) continue;
      const relations = await authz.clusterRelations(user.username, name);
      if (!relations.ok) {
        log.warn('Cluster permission check failed', { data: { username: user.username, cluster: name } });
        continue;
      }
      if (relations.value.length > 0) visible.push(cluster);
    }
    return visible;
  }

  async get(name: string): Promise<Result<ClusterDto, AppError>> {
    if (name === MGMT_CLUSTER_NAME) return ok(toClusterDto(managementClusterObject()));
    const cluster = await this.require(name);
    return cluster.ok ? ok(toClusterDto(cluster.value)) : cluster;
  }

  /** The Karmada `Cluster` object, or `CLUSTER_NOT_FOUND`. */
  async require(name: string): Promise<Result<K8sObject, AppError>> {
    try {
      return ok(await this.karmada.get(Kinds.cluster, name));
    } catch (error) {
      if (isNotFound(error)) return err(ClusterErrors.NOT_FOUND(name));
      return err(fromKubernetesError(error));
    }
  }

  async update(name: string, update: ClusterUpdate): Promise<Result<ClusterDto, AppError>> {
    const current = await this.require(name);
    if (!current.ok) return current;

    const object = current.value;
    const metadata = { ...object.metadata };
    if (update.labels) {
      metadata.labels = Object.fromEntries(update.labels.map((label) => [label.key, label.value]));
    }
    const spec = typeof object.spec === 'object' && object.spec !== null ? { ...object.spec } : {};
    const updated: K8sObject = {
      ...object,
      metadata,
      spec: update.taints ? { ...spec, taints: update.taints } : spec,
    };

    const replaced = await attempt(() => this.karmada.replace(updated), fromKubernetesError);
    if (!replaced.ok) return replaced;
    log.info('Cluster updated', { data: { cluster: name } });
    return ok(toClusterDto(replaced.value));
  }

  /** Delete the cluster and wait until the API server no longer returns it. */
  async delete(name: string): Promise<Result<void, AppError>> {
    try {
      await this.karmada.delete(Kinds.cluster, name);
    } catch (error) {
      if (isNotFound(error)) return err(ClusterErrors.NOT_FOUND(name));
      return err(fromKubernetesError(error));
    }

    const interval = this.deps.pollIntervalMs ?? DELETE_POLL_INTERVAL_MS;
    const timeout = this.deps.deleteTimeoutMs ?? DELETE_TIMEOUT_MS;
    for (let waited = 0; waited < timeout; waited += interval) {
      await this.sleep(interval);
      try {
        await this.karmada.get(Kinds.cluster, name);
      } catch (error) {
        if (isNotFound(error)) {
          log.info('Cluster deleted', { data: { cluster: name } });
          return ok(undefined);
        }
        log.warn('Polling deleted cluster failed', { data: { cluster: name }, error });
      }
    }
    return err(ClusterErrors.DELETE_TIMEOUT(name));
  }

  /**
   * Users with access to the cluster: dashboard admins with `admin`, the
   * others with the relations they hold. Empty without OpenFGA.
   */
  async clusterUsers(name: string): Promise<Result<{ users: ClusterUser[]; errors: string[] }, AppError>> {
    const cluster = await this.require(name);
    if (!cluster.ok) return cluster;

    const { authz, users } = this.deps;
    if (!authz || !users) return ok({ users: [], errors: [] });

    const records = await users.list();
    if (!records.ok) return records;

    const result: ClusterUser[] = [];
    for (const record of records.value) {
      const roles: string[] = [];
      const admin = await authz.isDashboardAdmin(record.username);
      if (!admin.ok) return admin;
      if (admin.value) roles.push('admin');
      const relations = await authz.clusterRelations(record.username, name);
      if (!relations.ok) return relations;
      roles.push(...relations.value);
      if (roles.length === 0) continue;
      result.push({ username: record.username, displayName: record.email, email: record.email, roles });
    }
    return ok({ users: result, errors: [] });
  }

  /** Check the caller may view (`view`) or manage (`manage`) the cluster's users. */
  async authorizeUserAccess(
    user: AuthUser,
    cluster: string,
    mode: 'view' | 'manage'
  ): Promise<Result<void, AppError>> {
    const authz = this.deps.authz;
    if (!authz) return ok(undefined);

    const access = await authz.hasClusterAccess(user.username, cluster);
    if (!access.ok) return err(AuthErrors.PERMISSION_CHECK_FAILED(access.error.message));
    if (!access.value) return err(ClusterErrors.ACCESS_DENIED(cluster));
    if (mode === 'view') return ok(undefined);

    const admin = await authz.isDashboardAdmin(user.username);
    if (!admin.ok) return err(AuthErrors.PERMISSION_CHECK_FAILED(admin.error.message));
    if (admin.value) return ok(undefined);
    const owner = await authz.hasClusterRelation(user.username, 'owner', cluster);
    if (!owner.ok) return err(AuthErrors.PERMISSION_CHECK_FAILED(owner.error.message));
    return owner.value ? ok(undefined) : err(ClusterErrors.ACCESS_DENIED(cluster));
  }

  /** Replace the owner/member relations of each listed user; dashboard admins are left alone. */
  async updateClusterUsers(
    name: string,
    updates: Array<{ username: string; roles: string[] }>
  ): Promise<Result<{ users: ClusterUser[]; errors: string[] }, AppError>> {
    if (updates.length === 0) return err(ClusterErrors.EMPTY_USER_LIST);
    const cluster = await this.require(name);
    if (!cluster.ok) return cluster;

    const authz = this.deps.authz;
    if (authz) {
      for (const update of updates) {
        const admin = await authz.isDashboardAdmin(update.username);
        if (!admin.ok) return admin;
        if (admin.value) {
          log.info('Skipping dashboard admin', { data: { username: update.username, cluster: name } });
          continue;
        }
        const relations = update.roles.flatMap((role): ClusterRelation[] => {
          const relation = clusterRelationFor(role);
          return relation ? [relation] : [];
        });
        const written = await authz.setClusterRelations(update.username, name, relations);
        if (!written.ok) {
          log.error('Failed to update cluster roles', {
            data: { username: update.username, cluster: name },
            error: written.error.message,
          });
        }
      }
    }

    return this.clusterUsers(name);
  }
}
