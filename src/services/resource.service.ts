/**
 * Resource operations shared by the management and member scopes. Every
 * method takes the `ClusterClient` of the scope it serves.
 */

import type { AppError } from '../lib/errors/base.js';
import { fromKubernetesError, K8sErrors } from '../lib/errors/k8s-errors.js';
import { ValidationErrors } from '../lib/errors/validation-errors.js';
import { type CrdGroup, crdResourceKind, groupCrds, parseCrd, summariseCrd } from '../lib/k8s/crd.js';
import { type DataSelectQuery, selectObjects } from '../lib/k8s/dataselect.js';
import { Kinds, type ResourceKind, resolveKind } from '../lib/k8s/kinds.js';
import {
  labelSelector,
  matchLabelsSchema,
  toUiItem,
  toUiList,
  type UiItem,
  type UiList,
  withClusterLabel,
  withoutManagedFields,
} from '../lib/k8s/objects.js';
import type { ClusterClient, K8sObject } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { attempt, err, ok } from '../lib/utils/result.js';

const log = createLogger('ResourceService');

export const LOG_LINES_PER_PAGE = 200;
export const RESTARTED_AT_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';
export const ARGOCD_NAMESPACE = 'argocd';

export interface PodLogPage {
  logs: string;
  page: number;
  totalPages: number;
  totalLines: number;
}

export type ResourceDetail = UiItem & { podList?: UiList };

export type CrdListing = { items: K8sObject[]; totalItems: number } | { groups: CrdGroup[]; totalItems: number };

/** Lines in a log: newline count, plus one for a trailing unterminated line. */
export function countLogLines(text: string): number {
  if (text.length === 0) return 0;
  let lines = 0;
  for (const char of text) {
    if (char === '\n') lines++;
  }
  return text.endsWith('\n') ? lines : lines + 1;
}

export function normalisePage(raw: string | undefined): number {
  const page = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(page) && page >= 1 ? page : 1;
}

const k8s = <T>(fn: () => Promise<T>): Promise<Result<T, AppError>> => attempt(fn, fromKubernetesError);

export class ResourceService {
  async list(
    client: ClusterClient,
    kindKey: string,
    query: DataSelectQuery,
    namespace?: string
  ): Promise<Result<UiList, AppError>> {
    const kind = resolveKind(kindKey);
    const objects = await k8s(() => client.list(kind, { namespace }));
    if (!objects.ok) return objects;
    return ok(this.toList(kind, objects.value, query));
  }

  toList(kind: ResourceKind, objects: K8sObject[], query: DataSelectQuery): UiList {
    const selected = selectObjects(objects, query);
    return toUiList(
      kind,
      selected.items.map((object) => toUiItem(kind, object)),
      selected.totalItems
    );
  }

  async detail(
    client: ClusterClient,
    kindKey: string,
    name: string,
    namespace?: string
  ): Promise<Result<ResourceDetail, AppError>> {
    const kind = resolveKind(kindKey);
    const object = await k8s(() => client.get(kind, name, namespace));
    if (!object.ok) return object;

    const detail: ResourceDetail = toUiItem(kind, object.value);
    if (kind.key === 'deployment') {
      const pods = await this.selectorPods(client, object.value, namespace);
      if (!pods.ok) return pods;
      detail.podList = pods.value;
    }
    return ok(detail);
  }

  private async selectorPods(
    client: ClusterClient,
    deployment: K8sObject,
    namespace?: string
  ): Promise<Result<UiList, AppError>> {
    const selector = matchLabelsSchema.safeParse(deployment);
    const matchLabels = selector.success ? selector.data.spec.selector.matchLabels : {};
    if (Object.keys(matchLabels).length === 0) {
      return ok(toUiList(Kinds.pod, [], 0));
    }
    const pods = await k8s(() =>
      client.list(Kinds.pod, { namespace, labelSelector: labelSelector(matchLabels) })
    );
    if (!pods.ok) return pods;
    return ok(toUiList(Kinds.pod, pods.value.map((pod) => toUiItem(Kinds.pod, pod)), pods.value.length));
  }

  async events(
    client: ClusterClient,
    name: string,
    query: DataSelectQuery,
    namespace?: string
  ): Promise<Result<UiList, AppError>> {
    const events = await k8s(() =>
      client.list(Kinds.event, { namespace, fieldSelector: `involvedObject.name=${name}` })
    );
    if (!events.ok) return events;
    return ok(this.toList(Kinds.event, events.value, query));
  }

  async nodePods(client: ClusterClient, node: string, query: DataSelectQuery): Promise<Result<UiList, AppError>> {
    const pods = await k8s(() => client.list(Kinds.pod, { fieldSelector: `spec.nodeName=${node}` }));
    if (!pods.ok) return pods;
    return ok(this.toList(Kinds.pod, pods.value, query));
  }

  async createNamespace(
    client: ClusterClient,
    name: string,
    skipAutoPropagation = false
  ): Promise<Result<K8sObject, AppError>> {
    const labels: Record<string, string> = skipAutoPropagation
      ? { 'namespace.karmada.io/skip-auto-propagation': 'true' }
      : {};
    return k8s(() =>
      client.create({ apiVersion: 'v1', kind: 'Namespace', metadata: { name, labels } })
    );
  }

  async podLogs(
    client: ClusterClient,
    namespace: string,
    pod: string,
    container: string | undefined,
    page: number
  ): Promise<Result<PodLogPage, AppError>> {
    const full = await k8s(() => client.podLogs(namespace, pod, { container }));
    if (!full.ok) return full;

    const totalLines = countLogLines(full.value);
    const totalPages = Math.ceil(totalLines / LOG_LINES_PER_PAGE);
    const tail = await k8s(() =>
      client.podLogs(namespace, pod, { container, tailLines: page * LOG_LINES_PER_PAGE })
    );
    if (!tail.ok) return tail;

    return ok({ logs: tail.value, page, totalPages, totalLines });
  }

  async restartDeployment(
    client: ClusterClient,
    namespace: string,
    name: string,
    now: Date = new Date()
  ): Promise<Result<{ message: string; timestamp: string }, AppError>> {
    const current = await k8s(() => client.get(Kinds.deployment, name, namespace));
    if (!current.ok) return current;

    const timestamp = now.toISOString();
    const updated = setTemplateAnnotation(current.value, RESTARTED_AT_ANNOTATION, timestamp);
    if (!updated) {
      return err(K8sErrors.API_ERROR(`deployment ${namespace}/${name} has no pod template`, 400));
    }

    const replaced = await k8s(() => client.replace(updated));
    if (!replaced.ok) return replaced;
    log.info('Deployment restarted', { data: { namespace, name, timestamp } });
    return ok({ message: 'Deployment restarted successfully', timestamp });
  }

  async getObject(
    client: ClusterClient,
    kindKey: string,
    name: string,
    namespace?: string
  ): Promise<Result<K8sObject, AppError>> {
    const kind = resolveKind(kindKey);
    return k8s(() => client.get(kind, name, namespace));
  }

  async deleteObject(
    client: ClusterClient,
    kindKey: string,
    name: string,
    namespace?: string
  ): Promise<Result<void, AppError>> {
    const kind = resolveKind(kindKey);
    return k8s(() => client.delete(kind, name, namespace));
  }

  /**
   * Create an object of `kindKey`. The body supplies the object; apiVersion,
   * kind and (for namespaced kinds) the namespace default from the route.
   */
  async createObject(
    client: ClusterClient,
    kindKey: string,
    body: K8sObject,
    namespace?: string
  ): Promise<Result<K8sObject, AppError>> {
    const prepared = this.prepare(kindKey, body, namespace);
    if (!prepared.ok) return prepared;
    return k8s(() => client.create(prepared.value));
  }

  async replaceObject(
    client: ClusterClient,
    kindKey: string,
    name: string,
    body: K8sObject,
    namespace?: string
  ): Promise<Result<K8sObject, AppError>> {
    const prepared = this.prepare(kindKey, body, namespace);
    if (!prepared.ok) return prepared;
    if (prepared.value.metadata?.name !== name) {
      return err(ValidationErrors.VALIDATION_ERROR([{ path: ['metadata', 'name'], message: `must be ${name}` }]));
    }
    return k8s(() => client.replace(prepared.value));
  }

  private prepare(kindKey: string, body: K8sObject, namespace?: string): Result<K8sObject, AppError> {
    const kind = resolveKind(kindKey);
    if (!body.metadata?.name) {
      return err(ValidationErrors.MISSING_REQUIRED_FIELD('metadata.name'));
    }
    const metadata = { ...body.metadata };
    if (kind.namespaced) {
      metadata.namespace = metadata.namespace ?? namespace ?? 'default';
    } else {
      delete metadata.namespace;
    }
    return ok({
      ...body,
      apiVersion: body.apiVersion ?? kind.apiVersion,
      kind: body.kind ?? kind.kind,
      metadata,
    });
  }

  async listCrds(client: ClusterClient, cluster: string, groupBy?: string): Promise<Result<CrdListing, AppError>> {
    const crds = await k8s(() => client.list(Kinds.crd));
    if (!crds.ok) return crds;
    const items = crds.value.map((crd) => summariseCrd(crd, cluster));
    if (groupBy === 'group') return ok({ groups: groupCrds(items), totalItems: items.length });
    return ok({ items, totalItems: items.length });
  }

  /**
   * Objects served by the CRD `crdName`, at the CRD's first version, each
   * labelled with `cluster`.
   */
  async listCustomResources(
    client: ClusterClient,
    cluster: string,
    group: string,
    crdName: string,
    namespace?: string
  ): Promise<Result<{ items: K8sObject[]; totalItems: number }, AppError>> {
    const crd = await k8s(() => client.get(Kinds.crd, crdName));
    if (!crd.ok) return crd;
    const parsed = parseCrd(crd.value);
    const kind = parsed ? crdResourceKind(parsed, group) : null;
    if (!kind) return err(K8sErrors.API_ERROR(`CRD ${crdName} has no versions`));

    const objects = await k8s(() => client.list(kind, { namespace }));
    if (!objects.ok) return objects;
    const items = objects.value.map((object) => withClusterLabel(withoutManagedFields(object), cluster));
    return ok({ items, totalItems: items.length });
  }

  /** Ask Argo CD to sync an application by setting its `operation`. */
  async syncApplication(
    client: ClusterClient,
    name: string,
    username: string,
    namespace = ARGOCD_NAMESPACE
  ): Promise<Result<K8sObject, AppError>> {
    const application = await this.getObject(client, 'application', name, namespace);
    if (!application.ok) return application;

    const updated: K8sObject = {
      ...application.value,
      operation: {
        initiatedBy: { username },
        sync: { syncStrategy: { hook: {} } },
      },
    };
    return k8s(() => client.replace(updated));
  }
}

/** Copy of `object` with an annotation on `spec.template.metadata`, or null without a template. */
export function setTemplateAnnotation(object: K8sObject, key: string, value: string): K8sObject | null {
  const spec = object.spec;
  if (typeof spec !== 'object' || spec === null || !('template' in spec)) return null;
  const template = spec.template;
  if (typeof template !== 'object' || template === null) return null;

  const templateMetadata =
    'metadata' in template && typeof template.metadata === 'object' && template.metadata !== null
      ? template.metadata
      : {};
  const annotations =
    'annotations' in templateMetadata &&
    typeof templateMetadata.annotations === 'object' &&
    templateMetadata.annotations !== null
      ? templateMetadata.annotations
      : {};

  return {
    ...object,
    spec: {
      ...spec,
      template: {
        ...template,
        metadata: { ...templateMetadata, annotations: { ...annotations, [key]: value } },
      },
    },
  };
}
