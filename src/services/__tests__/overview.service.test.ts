import { beforeEach, describe, expect, it } from 'vitest';
import { clusterObject, FakeApiError, FakeConnector, podObject } from '../../../tests/helpers/fake-cluster.js';
import type { K8sObject } from '../../lib/k8s/types.js';
import { AggregationService } from '../aggregation.service.js';
import { ClusterService } from '../cluster.service.js';
import { DashboardConfigStore } from '../dashboard-config.service.js';
import { GPU_PRODUCT_LABEL, GPU_RESOURCE, OverviewService } from '../overview.service.js';
import { ResourceService } from '../resource.service.js';

const NAMESPACE = 'karmada-system';

const node = (name: string, capacity: Record<string, string>, labels: Record<string, string> = {}): K8sObject => ({
  apiVersion: 'v1',
  kind: 'Node',
  metadata: { name, labels },
  status: { capacity, conditions: [{ type: 'Ready', status: 'True' }] },
});

const namespaced = (apiVersion: string, kind: string, name: string, namespace = 'default'): K8sObject => ({
  apiVersion,
  kind,
  metadata: { name, namespace },
});

describe('OverviewService', () => {
  let connector: FakeConnector;
  let service: OverviewService;

  beforeEach(() => {
    connector = new FakeConnector();
    connector
      .karmada()
      .seed(
        clusterObject('member1', {
          nodes: { total: 3, ready: 2 },
          allocatable: { cpu: '4', memory: '8Gi', pods: '110' },
          allocated: { cpu: '1', memory: '2Gi', pods: '10' },
        })
      )
      .seed(
        clusterObject('member2', {
          nodes: { total: 1, ready: 1 },
          allocatable: { cpu: '2', memory: '4Gi', pods: '110' },
          allocated: { cpu: '500m', memory: '1Gi', pods: '5' },
        })
      );
    const clusters = new ClusterService({ connector });
    service = new OverviewService(
      connector,
      clusters,
      new AggregationService(connector, clusters, new ResourceService()),
      new DashboardConfigStore(() => connector.management(), NAMESPACE),
      NAMESPACE
    );
  });

  describe('karmadaInfo', () => {
    it('reports the running API server', async () => {
      connector.management().seed({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'karmada-apiserver', namespace: NAMESPACE, creationTimestamp: new Date('2024-01-01T00:00:00Z') },
      });

      expect(await service.karmadaInfo()).toEqual({
        version: { gitVersion: 'v1.28.2' },
        status: 'running',
        createTime: '2024-01-01T00:00:00.000Z',
      });
    });

    it('is unknown when the API server does not answer', async () => {
      connector.karmada().failOn('serverVersion', new FakeApiError(503, 'unavailable'));
      expect(await service.karmadaInfo()).toEqual({ version: { gitVersion: '' }, status: 'unknown' });
    });
  });

  it('sums member cluster capacity', async () => {
    const result = await service.memberClusterStatus();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.nodeSummary).toEqual({ totalNum: 4, readyNum: 3 });
    expect(result.value.cpuSummary.totalCPU).toBe(6);
    expect(result.value.cpuSummary.allocatedCPU).toBeCloseTo(1.5);
    expect(result.value.memorySummary).toEqual({ totalMemory: 12 * 2 ** 20, allocatedMemory: 3 * 2 ** 20 });
    expect(result.value.podSummary).toEqual({ totalPod: 220, allocatedPod: 15 });
  });

  it('counts control plane resources', async () => {
    connector
      .karmada()
      .seed(namespaced('policy.karmada.io/v1alpha1', 'PropagationPolicy', 'pp'))
      .seed({ apiVersion: 'policy.karmada.io/v1alpha1', kind: 'ClusterPropagationPolicy', metadata: { name: 'cpp' } })
      .seed({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'default' } })
      .seed(namespaced('apps/v1', 'Deployment', 'web'))
      .seed(namespaced('batch/v1', 'CronJob', 'nightly'))
      .seed(namespaced('v1', 'ConfigMap', 'cfg'))
      .seed(namespaced('v1', 'Secret', 'creds'));

    expect(await service.clusterResourceStatus()).toEqual({
      ok: true,
      value: {
        propagationPolicyNum: 2,
        overridePolicyNum: 0,
        namespaceNum: 1,
        workloadNum: 2,
        serviceNum: 0,
        configNum: 2,
      },
    });
  });

  it('groups GPUs by product', async () => {
    connector
      .member('member1')
      .seed(node('gpu-a', { [GPU_RESOURCE]: '4' }, { [GPU_PRODUCT_LABEL]: 'A100' }))
      .seed(node('gpu-b', { [GPU_RESOURCE]: '2' }))
      .seed(node('cpu-only', { cpu: '8' }));
    connector.member('member2').seed(node('gpu-c', { [GPU_RESOURCE]: '2' }, { [GPU_PRODUCT_LABEL]: 'A100' }));

    expect(await service.gpuSummary()).toEqual({
      ok: true,
      value: {
        totalGPU: 8,
        gpuPools: [
          { model: 'A100', count: 6 },
          { model: 'Unknown', count: 2 },
        ],
      },
    });
  });

  it('estimates management cluster usage', async () => {
    connector
      .management()
      .seed(node('mgmt-1', { cpu: '4', memory: '8Gi', pods: '110' }))
      .seed({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'default' } })
      .seed(podObject('default', 'a'))
      .seed(podObject('default', 'b'));

    const result = await service.managementOverview();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.clusterName).toBe('mgmt-cluster');
    expect(result.value.nodeSummary).toEqual({ totalNum: 1, readyNum: 1 });
    expect(result.value.cpu.allocated).toBeCloseTo(1.6);
    expect(result.value.memory).toEqual({ capacity: 8 * 2 ** 30, allocated: 4 * 2 ** 30 });
    expect(result.value.pod).toEqual({ capacity: 110, allocated: 2 });
    expect(result.value.namespaceCount).toBe(1);
  });

  it('adds deployments and Argo CD counts for members', async () => {
    connector
      .member('member1')
      .seed(namespaced('apps/v1', 'Deployment', 'web'))
      .seed(namespaced('argoproj.io/v1alpha1', 'Application', 'shop', 'argocd'))
      .seed(namespaced('argoproj.io/v1alpha1', 'Application', 'billing', 'argocd'))
      .seed(namespaced('argoproj.io/v1alpha1', 'AppProject', 'default', 'argocd'));

    const result = await service.memberOverview('member1');

    expect(result.ok && result.value.deploymentCount).toBe(1);
    expect(result.ok && result.value.argoMetrics).toEqual({ applications: 2, applicationSets: 0, projects: 1 });
  });

  describe('metrics dashboards', () => {
    const dashboard = { name: 'Nodes', url: 'https://grafana.example/d/nodes' };

    it('saves and lists dashboards', async () => {
      expect(await service.saveDashboard(dashboard)).toEqual({ ok: true, value: { message: 'Dashboard saved successfully' } });
      expect(await service.metricsDashboards()).toEqual({ ok: true, value: [dashboard] });
    });

    it('rejects duplicate names', async () => {
      await service.saveDashboard(dashboard);
      const result = await service.saveDashboard({ ...dashboard, url: 'https://grafana.example/d/other' });
      expect(result.ok || result.error.code).toBe('DASHBOARD_EXISTS');
    });

    it('deletes by name and url', async () => {
      await service.saveDashboard(dashboard);

      const missing = await service.deleteDashboard('Nodes', 'https://grafana.example/d/other');
      expect(missing.ok || missing.error.status).toBe(404);
      expect(await service.deleteDashboard(dashboard.name, dashboard.url)).toEqual({
        ok: true,
        value: { message: 'Dashboard deleted successfully' },
      });
      expect(await service.metricsDashboards()).toEqual({ ok: true, value: [] });
    });
  });
});
