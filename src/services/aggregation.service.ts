/**
 * Fan-out listing across ready member clusters. Clusters are queried one
 * after another; a cluster that fails is logged and left out.
 */

import type { AppError } from '../lib/errors/base.js';
import { fromKubernetesError } from '../lib/errors/k8s-errors.js';
import { crdResourceKind, crdVersions, groupCrds, parseCrd, summariseCrd } from '../lib/k8s/crd.js';
import type { DataSelectQuery } from '../lib/k8s/dataselect.js';
import { Kinds, type ResourceKind } from '../lib/k8s/kinds.js';
import { type UiList, withClusterLabel, withoutManagedFields } from '../lib/k8s/objects.js';
import type { ClusterClient, ClusterConnector, K8sObject } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { ok } from '../lib/utils/result.js';
import type { ClusterService } from './cluster.service.js';
import type { CrdListing, ResourceService } from './resource.service.js';

const log = createLogger('Aggregation');

export interface ApiVersionInfo {
  group: string;
  versions: string[];
  cluster: string;
}

export class AggregationService {
  constructor(
    private connector: ClusterConnector,
    private clusters: ClusterService,
    private resources: ResourceService
  ) {}

  /**
   * Run `fn` against each ready member cluster and collect the results of
   * the clusters that answered.
   */
  async eachReadyCluster<T>(
    operation: string,
    fn: (client: ClusterClient, cluster: string) => Promise<T>
  ): Promise<Result<Array<{ cluster: string; value: T }>, AppError>> {
    const names = await this.clusters.readyClusterNames();
    if (!names.ok) return names;

    const results: Array<{ cluster: string; value: T }> = [];
    for (const cluster of names.value) {
      try {
        results.push({ cluster, value: await fn(this.connector.member(cluster), cluster) });
      } catch (error) {
        log.warn(`Skipping cluster after failed ${operation}`, {
          data: { cluster },
          error: fromKubernetesError(error).message,
        });
      }
    }
    return ok(results);
  }

  /** Objects of `kind` from every ready cluster, labelled `cluster=<name>`. */
  async listObjects(kind: ResourceKind, namespace?: string): Promise<Result<K8sObject[], AppError>> {
    const results = await this.eachReadyCluster(`list ${kind.key}`, (client) => client.list(kind, { namespace }));
    if (!results.ok) return results;
    return ok(
      results.value.flatMap(({ cluster, value }) => value.map((object) => withClusterLabel(object, cluster)))
    );
  }

  /** Aggregated list; sorted by name unless the query sorts. */
  async list(kind: ResourceKind, query: DataSelectQuery, namespace?: string): Promise<Result<UiList, AppError>> {
    const objects = await this.listObjects(kind, namespace);
    if (!objects.ok) return objects;
    const sorted: DataSelectQuery =
      query.sortBy.length > 0 ? query : { ...query, sortBy: [{ property: 'name', ascending: true }] };
    return ok(this.resources.toList(kind, objects.value, sorted));
  }

  /** Argo CD objects of every namespace on every ready cluster, ordered by name. */
  async argoObjects(kind: ResourceKind): Promise<Result<{ items: K8sObject[]; totalItems: number }, AppError>> {
    const objects = await this.listObjects(kind);
    if (!objects.ok) return objects;
    const items = objects.value
      .map(withoutManagedFields)
      .sort((a, b) => (a.metadata?.name ?? '').localeCompare(b.metadata?.name ?? ''));
    return ok({ items, totalItems: items.length });
  }

  /** CRD groups per cluster with their served versions, ordered by group then cluster. */
  async apiVersions(): Promise<Result<{ items: ApiVersionInfo[]; totalItems: number }, AppError>> {
    const results = await this.eachReadyCluster('list CRDs', (client) => client.list(Kinds.crd));
    if (!results.ok) return results;

    const items: ApiVersionInfo[] = [];
    for (const { cluster, value } of results.value) {
      const byGroup = new Map<string, Set<string>>();
      for (const object of value) {
        const crd = parseCrd(object);
        if (!crd) continue;
        const versions = byGroup.get(crd.spec.group) ?? new Set<string>();
        for (const version of crdVersions(crd)) versions.add(version);
        byGroup.set(crd.spec.group, versions);
      }
      for (const [group, versions] of byGroup) {
        items.push({ group, versions: [...versions].sort(), cluster });
      }
    }
    items.sort((a, b) => a.group.localeCompare(b.group) || a.cluster.localeCompare(b.cluster));
    return ok({ items, totalItems: items.length });
  }

  async definitions(groupBy?: string): Promise<Result<CrdListing, AppError>> {
    const results = await this.eachReadyCluster('list CRDs', (client) => client.list(Kinds.crd));
    if (!results.ok) return results;

    const items = results.value.flatMap(({ cluster, value }) => value.map((crd) => summariseCrd(crd, cluster)));
    if (groupBy === 'group') return ok({ groups: groupCrds(items), totalItems: items.length });
    return ok({ items, totalItems: items.length });
  }

  /**
   * Objects served by CRDs on every ready cluster. `group` and `crd` (a CRD
   * name) narrow which definitions are read.
   */
  async customResources(filter: {
    group?: string;
    crd?: string;
  }): Promise<Result<{ items: K8sObject[]; totalItems: number }, AppError>> {
    const results = await this.eachReadyCluster('list custom resources', async (client, cluster) => {
      const crds = await client.list(Kinds.crd);
      const objects: K8sObject[] = [];
      for (const object of crds) {
        const crd = parseCrd(object);
        if (!crd) continue;
        if (filter.group && crd.spec.group !== filter.group) continue;
        if (filter.crd && object.metadata?.name !== filter.crd) continue;
        const kind = crdResourceKind(crd);
        if (!kind) continue;
        try {
          const listed = await client.list(kind);
          objects.push(...listed.map((item) => withClusterLabel(item, cluster)));
        } catch (error) {
          log.debug('Custom resource list failed', { data: { cluster, kind: kind.kind }, error });
        }
      }
      return objects;
    });
    if (!results.ok) return results;

    const items = results.value.flatMap(({ value }) => value);
    return ok({ items, totalItems: items.length });
  }
}
