import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import type { AppError } from '../errors/base.js';
import { errorMessage } from '../errors/base.js';
import { K8sErrors } from '../errors/k8s-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

export interface KubeConfigOptions {
  /** Explicit path to kubeconfig file */
  kubeconfigPath?: string;
  /** Context to use (defaults to current-context) */
  context?: string;
  skipTLSVerify?: boolean;
}

type LoadOutcome = Result<boolean, AppError>;

/**
 * Load KubeConfig using tiered discovery:
 * 1. Explicit path parameter
 * 2. KUBECONFIG env var (colon-separated, first existing file)
 * 3. ~/.kube/config
 * 4. In-cluster service account
 */
export function loadKubeConfig(
  options: KubeConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Result<KubeConfig, AppError> {
  const kc = new KubeConfig();

  const tiers: Array<() => LoadOutcome> = [
    () => tryLoadFromFile(kc, options.kubeconfigPath, true),
    () =>
      tryLoadFromFile(
        kc,
        env.KUBECONFIG?.split(':').find((p) => p && existsSync(p))
      ),
    () => tryLoadFromFile(kc, join(homedir(), '.kube', 'config')),
    () => ok(env.KUBERNETES_SERVICE_HOST ? tryLoadFromCluster(kc) : false),
  ];

  let loaded = false;
  for (const tier of tiers) {
    const outcome = tier();
    if (!outcome.ok) return outcome;
    if (outcome.value) {
      loaded = true;
      break;
    }
  }

  if (!loaded) {
    return err(K8sErrors.KUBECONFIG_NOT_FOUND());
  }

  if (options.context) {
    const resolved = resolveContext(kc, options.context);
    if (!resolved.ok) return resolved;
  }

  return ok(options.skipTLSVerify ? withSkipTLSVerify(kc) : kc);
}

export function resolveContext(kc: KubeConfig, context: string): Result<string, AppError> {
  const found = kc.getContexts().find((c) => c.name === context);
  if (!found) {
    return err(K8sErrors.CONTEXT_NOT_FOUND(context));
  }
  kc.setCurrentContext(context);
  return ok(context);
}

/** Copy of `kc` with TLS verification disabled on every cluster entry. */
export function withSkipTLSVerify(kc: KubeConfig): KubeConfig {
  const next = new KubeConfig();
  next.loadFromOptions({
    clusters: kc.clusters.map((cluster) => ({ ...cluster, skipTLSVerify: true })),
    users: kc.users,
    contexts: kc.contexts,
    currentContext: kc.currentContext,
  });
  return next;
}

/**
 * KubeConfig that reaches a member cluster through the Karmada aggregated
 * proxy, reusing the Karmada credentials.
 */
export function memberKubeConfig(karmada: KubeConfig, clusterName: string): Result<KubeConfig, AppError> {
  const cluster = karmada.getCurrentCluster();
  const user = karmada.getCurrentUser();
  if (!cluster || !user) {
    return err(K8sErrors.KUBECONFIG_INVALID('karmada kubeconfig has no current cluster or user'));
  }

  const kc = new KubeConfig();
  kc.loadFromOptions({
    clusters: [
      {
        ...cluster,
        name: clusterName,
        server: `${cluster.server.replace(/\/+$/, '')}/apis/cluster.karmada.io/v1alpha1/clusters/${clusterName}/proxy`,
      },
    ],
    users: [user],
    contexts: [{ name: clusterName, cluster: clusterName, user: user.name }],
    currentContext: clusterName,
  });
  return ok(kc);
}

/** KubeConfig for the Karmada API server that authenticates with a bearer token. */
export function tokenKubeConfig(karmada: KubeConfig, token: string): Result<KubeConfig, AppError> {
  const cluster = karmada.getCurrentCluster();
  if (!cluster) {
    return err(K8sErrors.KUBECONFIG_INVALID('karmada kubeconfig has no current cluster'));
  }

  const kc = new KubeConfig();
  kc.loadFromOptions({
    clusters: [{ ...cluster, name: 'karmada-token' }],
    users: [{ name: 'token-user', token }],
    contexts: [{ name: 'karmada-token', cluster: 'karmada-token', user: 'token-user' }],
    currentContext: 'karmada-token',
  });
  return ok(kc);
}

function tryLoadFromFile(kc: KubeConfig, path: string | undefined, requireExists = false): LoadOutcome {
  if (!path) return ok(false);

  if (!existsSync(path)) {
    return requireExists ? err(K8sErrors.KUBECONFIG_NOT_FOUND(path)) : ok(false);
  }

  try {
    kc.loadFromFile(path);
    return ok(true);
  } catch (error) {
    return err(K8sErrors.KUBECONFIG_INVALID(errorMessage(error)));
  }
}

function tryLoadFromCluster(kc: KubeConfig): boolean {
  try {
    kc.loadFromCluster();
    return kc.getCurrentCluster() !== null;
  } catch {
    return false;
  }
}
