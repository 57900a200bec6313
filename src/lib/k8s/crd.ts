import { z } from 'zod';
import { customKind, type ResourceKind } from './kinds.js';
import type { K8sObject } from './types.js';

const crdSchema = z.object({
  spec: z
    .object({
      group: z.string(),
      scope: z.string().default('Namespaced'),
      names: z.object({ kind: z.string(), plural: z.string().optional() }).passthrough(),
      versions: z.array(z.object({ name: z.string() }).passthrough()).default([]),
    })
    .passthrough(),
  status: z.object({ acceptedNames: z.record(z.unknown()).optional() }).passthrough().optional(),
});

export type ParsedCrd = z.infer<typeof crdSchema>;

export function parseCrd(object: K8sObject): ParsedCrd | null {
  const parsed = crdSchema.safeParse(object);
  return parsed.success ? parsed.data : null;
}

/** Kind of the objects a CRD serves, at its first listed version. */
export function crdResourceKind(crd: ParsedCrd, group = crd.spec.group): ResourceKind | null {
  const version = crd.spec.versions[0]?.name;
  if (!version) return null;
  return customKind(group, version, crd.spec.names.kind, crd.spec.scope === 'Namespaced');
}

/** Unique version names served by a CRD, sorted. */
export const crdVersions = (crd: ParsedCrd): string[] =>
  [...new Set(crd.spec.versions.map((version) => version.name))].sort();

/**
 * List form of a CRD: managed fields dropped, `cluster` and `group` labels
 * added, spec cut down to group and scope, accepted names lifted to the top.
 */
export function summariseCrd(object: K8sObject, cluster: string): K8sObject {
  const crd = parseCrd(object);
  const { managedFields: _managedFields, ...metadata } = object.metadata ?? {};
  const group = crd?.spec.group ?? '';
  const summary: K8sObject = {
    apiVersion: object.apiVersion,
    kind: object.kind,
    metadata: { ...metadata, labels: { ...metadata.labels, cluster, group } },
    spec: crd ? { group, scope: crd.spec.scope } : object.spec,
  };
  if (crd?.status?.acceptedNames) summary.acceptedNames = crd.status.acceptedNames;
  return summary;
}

export interface CrdGroup {
  group: string;
  cluster: string;
  crds: K8sObject[];
  count: number;
}

/** Group `summariseCrd` output by (group, cluster), ordered by group then cluster. */
export function groupCrds(summaries: K8sObject[]): CrdGroup[] {
  const groups = new Map<string, CrdGroup>();
  for (const crd of summaries) {
    const group = crd.metadata?.labels?.group ?? '';
    const cluster = crd.metadata?.labels?.cluster ?? '';
    const key = `${group}\u0000${cluster}`;
    const entry = groups.get(key) ?? { group, cluster, crds: [], count: 0 };
    entry.crds.push(crd);
    entry.count = entry.crds.length;
    groups.set(key, entry);
  }
  return [...groups.values()].sort(
    (a, b) => a.group.localeCompare(b.group) || a.cluster.localeCompare(b.cluster)
  );
}
