import type { V1ObjectMeta } from '@kubernetes/client-node';
import { z } from 'zod';
import type { ResourceKind } from './kinds.js';
import type { K8sObject } from './types.js';

const containerSchema = z.object({ name: z.string().optional(), image: z.string().optional() });

const podSpecSchema = z
  .object({
    containers: z.array(containerSchema).default([]),
    initContainers: z.array(containerSchema).default([]),
  })
  .passthrough();

const workloadSchema = z.object({
  spec: z
    .object({
      replicas: z.number().optional(),
      completions: z.number().optional(),
      template: z.object({ spec: podSpecSchema.optional() }).passthrough().optional(),
    })
    .passthrough()
    .default({}),
  status: z
    .object({
      readyReplicas: z.number().optional(),
      numberReady: z.number().optional(),
      desiredNumberScheduled: z.number().optional(),
      succeeded: z.number().optional(),
    })
    .passthrough()
    .default({}),
});

export interface PodInfo {
  current: number;
  desired: number;
}

export interface UiItem {
  objectMeta: V1ObjectMeta;
  typeMeta: { kind: string };
  spec?: unknown;
  status?: unknown;
  pods?: PodInfo;
  containerImages?: string[];
  initContainerImages?: string[];
}

function podInfo(kind: ResourceKind, workload: z.infer<typeof workloadSchema>): PodInfo {
  const { spec, status } = workload;
  switch (kind.kind) {
    case 'DaemonSet':
      return { current: status.numberReady ?? 0, desired: status.desiredNumberScheduled ?? 0 };
    case 'Job':
      return { current: status.succeeded ?? 0, desired: spec.completions ?? 1 };
    default:
      return { current: status.readyReplicas ?? 0, desired: spec.replicas ?? 0 };
  }
}

function images(containers: Array<z.infer<typeof containerSchema>>): string[] {
  return containers.flatMap((container) => (container.image ? [container.image] : []));
}

/** Shape an object the way the dashboard lists and detail pages render it. */
export function toUiItem(kind: ResourceKind, object: K8sObject): UiItem {
  const item: UiItem = {
    objectMeta: object.metadata ?? {},
    typeMeta: { kind: kind.key },
    spec: object.spec,
    status: object.status,
  };

  if (kind.workload) {
    const parsed = workloadSchema.safeParse(object);
    if (parsed.success) {
      const podSpec = parsed.data.spec.template?.spec;
      item.pods = podInfo(kind, parsed.data);
      item.containerImages = images(podSpec?.containers ?? []);
      item.initContainerImages = images(podSpec?.initContainers ?? []);
    }
  }

  return item;
}

export interface UiList {
  listMeta: { totalItems: number };
  errors: string[];
  [listKey: string]: unknown;
}

export function toUiList(kind: ResourceKind, items: UiItem[], totalItems: number): UiList {
  return {
    listMeta: { totalItems },
    [kind.listKey]: items,
    errors: [],
  };
}

/** Copy of `object` carrying a `cluster=<name>` label. */
export function withClusterLabel(object: K8sObject, cluster: string): K8sObject {
  const metadata = object.metadata ?? {};
  return {
    ...object,
    metadata: { ...metadata, labels: { ...metadata.labels, cluster } },
  };
}

export function withoutManagedFields(object: K8sObject): K8sObject {
  const { managedFields: _managedFields, ...metadata } = object.metadata ?? {};
  return { ...object, metadata };
}

export function labelSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

export const matchLabelsSchema = z.object({
  spec: z.object({
    selector: z.object({ matchLabels: z.record(z.string()).default({}) }).default({}),
  }),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** A JSON object whose `metadata`, when present, is an object too. */
export const k8sObjectSchema = z.custom<K8sObject>(
  (value) => isRecord(value) && (value.metadata === undefined || isRecord(value.metadata)),
  'body must be a Kubernetes object'
);
