import { z } from 'zod';
import kindTable from './resource-kinds.json' with { type: 'json' };

const kindEntrySchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.string().min(1),
  namespaced: z.boolean(),
  listKey: z.string().min(1),
  workload: z.boolean().default(false),
  aggregated: z.boolean().default(false),
});

/** Dashboard kind descriptor, addressed by a lowercase key such as `deployment`. */
export interface ResourceKind extends z.infer<typeof kindEntrySchema> {
  key: string;
}

const registry: ReadonlyMap<string, ResourceKind> = new Map(
  Object.entries(z.record(kindEntrySchema).parse(kindTable)).map(([key, entry]) => [
    key,
    { ...entry, key },
  ])
);

const capitalise = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

/**
 * Resolve a kind key. Keys outside the table are treated as namespaced
 * `v1` kinds; a dotted key `group.name` puts the last segment in the kind
 * and the rest in the API group.
 */
export function resolveKind(key: string): ResourceKind {
  const lower = key.toLowerCase();
  const known = registry.get(lower);
  if (known) return known;

  const parts = lower.split('.');
  const name = parts.pop() ?? lower;
  const group = parts.join('.');
  return {
    key: lower,
    apiVersion: group ? `${group}/v1` : 'v1',
    kind: capitalise(name),
    namespaced: true,
    listKey: 'items',
    workload: false,
    aggregated: false,
  };
}

export function findKind(key: string): ResourceKind | undefined {
  return registry.get(key.toLowerCase());
}

export function aggregatedKinds(): ResourceKind[] {
  return [...registry.values()].filter((kind) => kind.aggregated);
}

/** Argo CD route types and the registry keys they stand for. */
export const ARGOCD_KINDS: Readonly<Record<string, string>> = {
  project: 'appproject',
  application: 'application',
  applicationset: 'applicationset',
};

export const Kinds = {
  cluster: resolveKind('cluster'),
  configMap: resolveKind('configmap'),
  crd: resolveKind('customresourcedefinition'),
  deployment: resolveKind('deployment'),
  event: resolveKind('event'),
  namespace: resolveKind('namespace'),
  node: resolveKind('node'),
  pod: resolveKind('pod'),
  secret: resolveKind('secret'),
} as const;

/** Kind descriptor for an arbitrary group/version/kind, used for custom resources. */
export function customKind(group: string, version: string, kind: string, namespaced: boolean): ResourceKind {
  return {
    key: kind.toLowerCase(),
    apiVersion: group ? `${group}/${version}` : version,
    kind,
    namespaced,
    listKey: 'items',
    workload: false,
    aggregated: false,
  };
}
