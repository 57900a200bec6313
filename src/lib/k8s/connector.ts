import type { KubeConfig } from '@kubernetes/client-node';
import { AppErrorClass } from '../errors/base.js';
import { KubernetesClusterClient } from './cluster-client.js';
import { memberKubeConfig, tokenKubeConfig } from './kubeconfig.js';
import type { ClusterClient, ClusterConnector } from './types.js';

/**
 * Builds and caches clients for the management cluster, the Karmada API
 * server and member clusters reached through the Karmada cluster proxy.
 */
export class KubeConfigConnector implements ClusterConnector {
  private managementClient: ClusterClient;
  private karmadaClient: ClusterClient;
  private members = new Map<string, ClusterClient>();

  constructor(
    private karmadaConfig: KubeConfig,
    managementConfig: KubeConfig
  ) {
    this.karmadaClient = new KubernetesClusterClient(karmadaConfig);
    this.managementClient = new KubernetesClusterClient(managementConfig);
  }

  management(): ClusterClient {
    return this.managementClient;
  }

  karmada(): ClusterClient {
    return this.karmadaClient;
  }

  member(name: string): ClusterClient {
    const cached = this.members.get(name);
    if (cached) return cached;

    const kc = memberKubeConfig(this.karmadaConfig, name);
    if (!kc.ok) throw new AppErrorClass(kc.error);
    const client = new KubernetesClusterClient(kc.value);
    this.members.set(name, client);
    return client;
  }

  withToken(token: string): ClusterClient {
    const kc = tokenKubeConfig(this.karmadaConfig, token);
    if (!kc.ok) throw new AppErrorClass(kc.error);
    return new KubernetesClusterClient(kc.value);
  }
}
