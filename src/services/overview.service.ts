import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { fromKubernetesError } from '../lib/errors/k8s-errors.js';
import { MonitoringErrors } from '../lib/errors/monitoring-errors.js';
import { Kinds, resolveKind } from '../lib/k8s/kinds.js';
import { parseQuantity } from '../lib/k8s/quantity.js';
import { type ClusterClient, type ClusterConnector, type K8sObject, MGMT_CLUSTER_NAME } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { attempt, err, ok } from '../lib/utils/result.js';
import type { AggregationService } from './aggregation.service.js';
import { type ClusterService, parseCluster } from './cluster.service.js';
import type { DashboardConfigStore } from './dashboard-config.service.js';
import { ARGOCD_NAMESPACE } from './resource.service.js';

const log = createLogger('Overview');

export const DASHBOARD_KEY = 'dashboard';
export const GPU_RESOURCE = 'nvidia.com/gpu';
export const GPU_PRODUCT_LABEL = 'nvidia.com/gpu.product';
export const KARMADA_APISERVER = 'karmada-apiserver';
const MGMT_CPU_UTILISATION = 0.4;
const MGMT_MEMORY_UTILISATION = 0.5;

const metricsDashboardSchema = z.object({ name: z.string(), url: z.string() });
export type MetricsDashboard = z.infer<typeof metricsDashboardSchema>;

export const dashboardListSchema = z.object({
  dashboards: z.array(metricsDashboardSchema).nullish().transform((value) => value ?? []),
});

const nodeSchema = z.object({
  metadata: z.object({ labels: z.record(z.string()).default({}) }).passthrough().default({}),
  status: z
    .object({
      capacity: z.record(z.union([z.string(), z.number()])).default({}),
      conditions: z.array(z.object({ type: z.string(), status: z.string() }).passthrough()).default([]),
    })
    .passthrough()
    .default({}),
});

export interface KarmadaInfo {
  version: { gitVersion: string };
  status: 'running' | 'unknown';
  createTime?: string;
}

export interface MemberClusterStatus {
  nodeSummary: { totalNum: number; readyNum: number };
  cpuSummary: { totalCPU: number; allocatedCPU: number };
  memorySummary: { totalMemory: number; allocatedMemory: number };
  podSummary: { totalPod: number; allocatedPod: number };
}

export interface ClusterResourceStatus {
  propagationPolicyNum: number;
  overridePolicyNum: number;
  namespaceNum: number;
  workloadNum: number;
  serviceNum: number;
  configNum: number;
}

export interface Overview {
  karmadaInfo: KarmadaInfo;
  memberClusterStatus: MemberClusterStatus;
  clusterResourceStatus: ClusterResourceStatus;
  metricsDashboards: MetricsDashboard[];
}

export interface GpuSummary {
  totalGPU: number;
  gpuPools: Array<{ model: string; count: number }>;
}

export interface CapacityUsage {
  capacity: number;
  allocated: number;
}

export interface ClusterOverview {
  clusterName: string;
  nodeSummary: { totalNum: number; readyNum: number };
  cpu: CapacityUsage;
  memory: CapacityUsage;
  pod: CapacityUsage;
  namespaceCount: number;
}

export interface MemberOverview extends ClusterOverview {
  deploymentCount: number;
  argoMetrics: { applications: number; applicationSets: number; projects: number };
}

const WORKLOAD_KINDS = ['deployment', 'statefulset', 'daemonset', 'job', 'cronjob'];

function nodeTotals(nodes: K8sObject[]) {
  let ready = 0;
  let cpu = 0;
  let memory = 0;
  let pods = 0;
  for (const object of nodes) {
    const node = nodeSchema.safeParse(object);
    if (!node.success) continue;
    const { capacity, conditions } = node.data.status;
    if (conditions.some((condition) => condition.type === 'Ready' && condition.status === 'True')) ready++;
    cpu += parseQuantity(capacity.cpu);
    memory += parseQuantity(capacity.memory);
    pods += parseQuantity(capacity.pods);
  }
  return { nodeSummary: { totalNum: nodes.length, readyNum: ready }, cpu, memory, pods };
}

const k8s = <T>(fn: () => Promise<T>): Promise<Result<T, AppError>> => attempt(fn, fromKubernetesError);

export class OverviewService {
  constructor(
    private connector: ClusterConnector,
    private clusters: ClusterService,
    private aggregation: AggregationService,
    private config: DashboardConfigStore,
    private namespace: string
  ) {}

  async overview(): Promise<Result<Overview, AppError>> {
    const karmadaInfo = await this.karmadaInfo();
    const memberClusterStatus = await this.memberClusterStatus();
    if (!memberClusterStatus.ok) return memberClusterStatus;
    const clusterResourceStatus = await this.clusterResourceStatus();
    if (!clusterResourceStatus.ok) return clusterResourceStatus;
    const metricsDashboards = await this.metricsDashboards();
    if (!metricsDashboards.ok) return metricsDashboards;

    return ok({
      karmadaInfo,
      memberClusterStatus: memberClusterStatus.value,
      clusterResourceStatus: clusterResourceStatus.value,
      metricsDashboards: metricsDashboards.value,
    });
  }

  async karmadaInfo(): Promise<KarmadaInfo> {
    const info: KarmadaInfo = { version: { gitVersion: '' }, status: 'unknown' };
    try {
      info.version.gitVersion = await this.connector.karmada().serverVersion();
      info.status = 'running';
    } catch (error) {
      log.warn('Karmada API server version unavailable', { error: fromKubernetesError(error).message });
    }

    try {
      const deployment = await this.connector.management().get(Kinds.deployment, KARMADA_APISERVER, this.namespace);
      const created = deployment.metadata?.creationTimestamp;
      if (created) info.createTime = new Date(created).toISOString();
    } catch (error) {
      log.debug('Karmada API server deployment not found', { error: fromKubernetesError(error).message });
    }
    return info;
  }

  async memberClusterStatus(): Promise<Result<MemberClusterStatus, AppError>> {
    const clusters = await this.clusters.listObjects();
    if (!clusters.ok) return clusters;

    const status: MemberClusterStatus = {
      nodeSummary: { totalNum: 0, readyNum: 0 },
      cpuSummary: { totalCPU: 0, allocatedCPU: 0 },
      memorySummary: { totalMemory: 0, allocatedMemory: 0 },
      podSummary: { totalPod: 0, allocatedPod: 0 },
    };
    for (const object of clusters.value) {
      const cluster = parseCluster(object);
      const { allocatable, allocated } = cluster.status.resourceSummary;
      status.nodeSummary.totalNum += cluster.status.nodeSummary.totalNum;
      status.nodeSummary.readyNum += cluster.status.nodeSummary.readyNum;
      status.cpuSummary.totalCPU += parseQuantity(allocatable.cpu);
      status.cpuSummary.allocatedCPU += parseQuantity(allocated.cpu);
      status.memorySummary.totalMemory += parseQuantity(allocatable.memory) / 1024;
      status.memorySummary.allocatedMemory += parseQuantity(allocated.memory) / 1024;
      status.podSummary.totalPod += parseQuantity(allocatable.pods);
      status.podSummary.allocatedPod += parseQuantity(allocated.pods);
    }
    return ok(status);
  }

  async clusterResourceStatus(): Promise<Result<ClusterResourceStatus, AppError>> {
    const karmada = this.connector.karmada();
    const count = async (keys: string[]): Promise<Result<number, AppError>> => {
      let total = 0;
      for (const key of keys) {
        const objects = await k8s(() => karmada.list(resolveKind(key)));
        if (!objects.ok) return objects;
        total += objects.value.length;
      }
      return ok(total);
    };

    const propagation = await count(['propagationpolicy', 'clusterpropagationpolicy']);
    if (!propagation.ok) return propagation;
    const override = await count(['overridepolicy', 'clusteroverridepolicy']);
    if (!override.ok) return override;
    const namespaces = await count(['namespace']);
    if (!namespaces.ok) return namespaces;
    const workloads = await count(WORKLOAD_KINDS);
    if (!workloads.ok) return workloads;
    const services = await count(['service']);
    if (!services.ok) return services;
    const configs = await count(['configmap', 'secret']);
    if (!configs.ok) return configs;

    return ok({
      propagationPolicyNum: propagation.value,
      overridePolicyNum: override.value,
      namespaceNum: namespaces.value,
      workloadNum: workloads.value,
      serviceNum: services.value,
      configNum: configs.value,
    });
  }

  async metricsDashboards(): Promise<Result<MetricsDashboard[], AppError>> {
    const config = await this.config.read(DASHBOARD_KEY, dashboardListSchema);
    if (!config.ok) return config;
    return ok(config.value?.dashboards ?? []);
  }

  async saveDashboard(dashboard: MetricsDashboard): Promise<Result<{ message: string }, AppError>> {
    const dashboards = await this.metricsDashboards();
    if (!dashboards.ok) return dashboards;
    if (dashboards.value.some((entry) => entry.name === dashboard.name)) {
      return err(MonitoringErrors.DASHBOARD_EXISTS(dashboard.name));
    }
    const written = await this.config.write(DASHBOARD_KEY, { dashboards: [...dashboards.value, dashboard] });
    return written.ok ? ok({ message: 'Dashboard saved successfully' }) : written;
  }

  async deleteDashboard(name: string, url: string): Promise<Result<{ message: string }, AppError>> {
    const dashboards = await this.metricsDashboards();
    if (!dashboards.ok) return dashboards;
    const remaining = dashboards.value.filter((entry) => !(entry.name === name && entry.url === url));
    if (remaining.length === dashboards.value.length) {
      return err(MonitoringErrors.DASHBOARD_NOT_FOUND(name, url));
    }
    const written = await this.config.write(DASHBOARD_KEY, { dashboards: remaining });
    return written.ok ? ok({ message: 'Dashboard deleted successfully' }) : written;
  }

  /** GPUs by product across ready member clusters, pools sorted by model. */
  async gpuSummary(): Promise<Result<GpuSummary, AppError>> {
    const nodes = await this.aggregation.listObjects(Kinds.node);
    if (!nodes.ok) return nodes;

    const byModel = new Map<string, number>();
    let totalGPU = 0;
    for (const object of nodes.value) {
      const node = nodeSchema.safeParse(object);
      if (!node.success) continue;
      const count = parseQuantity(node.data.status.capacity[GPU_RESOURCE]);
      if (count <= 0) continue;
      const model = node.data.metadata.labels[GPU_PRODUCT_LABEL] || 'Unknown';
      byModel.set(model, (byModel.get(model) ?? 0) + count);
      totalGPU += count;
    }
    const gpuPools = [...byModel.entries()]
      .map(([model, count]) => ({ model, count }))
      .sort((a, b) => a.model.localeCompare(b.model));
    return ok({ totalGPU, gpuPools });
  }

  private async clusterOverview(client: ClusterClient, clusterName: string): Promise<Result<ClusterOverview, AppError>> {
    const nodes = await k8s(() => client.list(Kinds.node));
    if (!nodes.ok) return nodes;
    const namespaces = await k8s(() => client.list(Kinds.namespace));
    if (!namespaces.ok) return namespaces;
    const pods = await k8s(() => client.list(Kinds.pod));
    if (!pods.ok) return pods;

    const totals = nodeTotals(nodes.value);
    return ok({
      clusterName,
      nodeSummary: totals.nodeSummary,
      cpu: { capacity: totals.cpu, allocated: totals.cpu * MGMT_CPU_UTILISATION },
      memory: { capacity: totals.memory, allocated: totals.memory * MGMT_MEMORY_UTILISATION },
      pod: { capacity: totals.pods, allocated: pods.value.length },
      namespaceCount: namespaces.value.length,
    });
  }

  async managementOverview(): Promise<Result<ClusterOverview, AppError>> {
    return this.clusterOverview(this.connector.management(), MGMT_CLUSTER_NAME);
  }

  async memberOverview(cluster: string): Promise<Result<MemberOverview, AppError>> {
    const client = this.connector.member(cluster);
    const base = await this.clusterOverview(client, cluster);
    if (!base.ok) return base;

    const deployments = await k8s(() => client.list(Kinds.deployment));
    if (!deployments.ok) return deployments;

    // Argo CD may not be installed on the member cluster.
    const argoCount = async (key: string) => {
      const objects = await k8s(() => client.list(resolveKind(key), { namespace: ARGOCD_NAMESPACE }));
      return objects.ok ? objects.value.length : 0;
    };

    return ok({
      ...base.value,
      deploymentCount: deployments.value.length,
      argoMetrics: {
        applications: await argoCount('application'),
        applicationSets: await argoCount('applicationset'),
        projects: await argoCount('appproject'),
      },
    });
  }
}
