import type { KubeConfig } from '@kubernetes/client-node';
import * as k8s from '@kubernetes/client-node';
import type { ResourceKind } from './kinds.js';
import type {
  ClusterClient,
  ExecHandle,
  ExecRequest,
  ExecStreams,
  K8sObject,
  ListOptions,
  PodLogOptions,
  ServiceAccountToken,
} from './types.js';

/**
 * `ClusterClient` backed by @kubernetes/client-node. Errors from the client
 * propagate unchanged; callers map them with `fromKubernetesError`.
 */
export class KubernetesClusterClient implements ClusterClient {
  private objects: k8s.KubernetesObjectApi;
  private core: k8s.CoreV1Api;
  private version: k8s.VersionApi;

  constructor(private kc: KubeConfig) {
    this.objects = k8s.KubernetesObjectApi.makeApiClient(kc);
    this.core = kc.makeApiClient(k8s.CoreV1Api);
    this.version = kc.makeApiClient(k8s.VersionApi);
  }

  async list(kind: ResourceKind, options: ListOptions = {}): Promise<K8sObject[]> {
    const response = await this.objects.list<K8sObject>(
      kind.apiVersion,
      kind.kind,
      kind.namespaced ? options.namespace : undefined,
      undefined,
      undefined,
      undefined,
      options.fieldSelector,
      options.labelSelector
    );
    return response.items;
  }

  async get(kind: ResourceKind, name: string, namespace?: string): Promise<K8sObject> {
    return this.objects.read<K8sObject>({
      apiVersion: kind.apiVersion,
      kind: kind.kind,
      metadata: { name, namespace: kind.namespaced ? namespace : undefined },
    });
  }

  async create(object: K8sObject): Promise<K8sObject> {
    return this.objects.create(object);
  }

  async replace(object: K8sObject): Promise<K8sObject> {
    return this.objects.replace(object);
  }

  async delete(kind: ResourceKind, name: string, namespace?: string): Promise<void> {
    await this.objects.delete({
      apiVersion: kind.apiVersion,
      kind: kind.kind,
      metadata: { name, namespace: kind.namespaced ? namespace : undefined },
    });
  }

  async podLogs(namespace: string, pod: string, options: PodLogOptions = {}): Promise<string> {
    return this.core.readNamespacedPodLog({
      name: pod,
      namespace,
      container: options.container,
      tailLines: options.tailLines,
    });
  }

  async createServiceAccountToken(
    namespace: string,
    name: string,
    request: { audiences: string[]; expirationSeconds: number }
  ): Promise<ServiceAccountToken> {
    const response = await this.core.createNamespacedServiceAccountToken({
      name,
      namespace,
      body: {
        apiVersion: 'authentication.k8s.io/v1',
        kind: 'TokenRequest',
        spec: {
          audiences: request.audiences,
          expirationSeconds: request.expirationSeconds,
        },
      },
    });
    const token = response.status?.token;
    if (!token) {
      throw new Error(`token request for ${namespace}/${name} returned no token`);
    }
    return {
      token,
      expiresAt:
        response.status?.expirationTimestamp ??
        new Date(Date.now() + request.expirationSeconds * 1000),
    };
  }

  async serverVersion(): Promise<string> {
    const info = await this.version.getCode();
    return info.gitVersion;
  }

  async exec(request: ExecRequest, streams: ExecStreams): Promise<ExecHandle> {
    const exec = new k8s.Exec(this.kc);
    const socket = await exec.exec(
      request.namespace,
      request.pod,
      request.container,
      request.command,
      streams.stdout,
      streams.stderr,
      streams.stdin,
      request.tty,
      streams.onStatus
    );
    return { close: () => socket.close() };
  }
}
