import type { Readable, Writable } from 'node:stream';
import type { KubernetesObject, V1Status } from '@kubernetes/client-node';
import type { ResourceKind } from './kinds.js';

/** Any Kubernetes object, with the fields outside `metadata` left untyped. */
export interface K8sObject extends KubernetesObject {
  [field: string]: unknown;
}

export interface ListOptions {
  namespace?: string;
  labelSelector?: string;
  fieldSelector?: string;
}

export interface PodLogOptions {
  container?: string;
  tailLines?: number;
}

export interface ServiceAccountToken {
  token: string;
  expiresAt: Date;
}

export interface ExecRequest {
  namespace: string;
  pod: string;
  container: string;
  command: string[];
  tty: boolean;
}

export interface ExecStreams {
  stdout: Writable;
  stderr: Writable;
  stdin: Readable;
  onStatus?: (status: V1Status) => void;
}

export interface ExecHandle {
  close(): void;
}

/** Object-level access to one Kubernetes API server. */
export interface ClusterClient {
  list(kind: ResourceKind, options?: ListOptions): Promise<K8sObject[]>;
  get(kind: ResourceKind, name: string, namespace?: string): Promise<K8sObject>;
  create(object: K8sObject): Promise<K8sObject>;
  replace(object: K8sObject): Promise<K8sObject>;
  delete(kind: ResourceKind, name: string, namespace?: string): Promise<void>;
  podLogs(namespace: string, pod: string, options?: PodLogOptions): Promise<string>;
  createServiceAccountToken(
    namespace: string,
    name: string,
    request: { audiences: string[]; expirationSeconds: number }
  ): Promise<ServiceAccountToken>;
  serverVersion(): Promise<string>;
  exec(request: ExecRequest, streams: ExecStreams): Promise<ExecHandle>;
}

/** Resolves clients for the three cluster scopes the dashboard talks to. */
export interface ClusterConnector {
  management(): ClusterClient;
  karmada(): ClusterClient;
  member(name: string): ClusterClient;
  /** Client for the Karmada API server authenticated by a bearer token. */
  withToken(token: string): ClusterClient;
}

export const MGMT_CLUSTER_NAME = 'mgmt-cluster';
