import type { KubeConfig } from '@kubernetes/client-node';
import type { RelationStore } from '../lib/authz/relation-store.js';
import type { DashboardConfig } from '../lib/config/schemas.js';
import { KubeConfigConnector } from '../lib/k8s/connector.js';
import type { ClusterConnector } from '../lib/k8s/types.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';
import { AggregationService } from '../services/aggregation.service.js';
import { AuthService } from '../services/auth.service.js';
import { AuthorizationService } from '../services/authorization.service.js';
import { ClusterService } from '../services/cluster.service.js';
import { DashboardConfigStore } from '../services/dashboard-config.service.js';
import { KeycloakService } from '../services/keycloak.service.js';
import { MonitoringService } from '../services/monitoring.service.js';
import { OverviewService } from '../services/overview.service.js';
import { NodePorchTransport, type PorchTransport, PorchService, ServiceAccountTokenCache } from '../services/porch.service.js';
import { ResourceService } from '../services/resource.service.js';
import { TerminalService } from '../services/terminal.service.js';
import { UserSettingService } from '../services/user-setting.service.js';
import { UserStoreService } from '../services/user-store.service.js';
import type { RouterDependencies } from './router.js';

export interface RuntimeInputs {
  connector: ClusterConnector;
  /** Null when OpenFGA is not configured or failed to initialise. */
  relations: RelationStore | null;
  /** Null when etcd could not be reached. */
  kv: KeyValueStore | null;
  porchTransport?: PorchTransport;
  fetch?: typeof fetch;
}

export interface Runtime extends RouterDependencies {
  users: UserStoreService | null;
}

export function connectorFor(karmada: KubeConfig, management: KubeConfig): ClusterConnector {
  return new KubeConfigConnector(karmada, management);
}

/** Wire every service the router needs from the configuration and its backends. */
export function createRuntime(config: DashboardConfig, inputs: RuntimeInputs): Runtime {
  const { connector, relations, kv } = inputs;

  const authorizationService = relations ? new AuthorizationService(relations) : null;
  const users = kv ? new UserStoreService(kv) : null;
  const keycloakService = new KeycloakService(config.keycloak);
  const authService = new AuthService({
    jwtSecret: config.auth.jwtSecret,
    keycloak: keycloakService,
    connector,
    users,
    kv,
  });

  const clusterService = new ClusterService({ connector, authz: authorizationService, users });
  const resourceService = new ResourceService();
  const aggregationService = new AggregationService(connector, clusterService, resourceService);

  const management = () => connector.management();
  const dashboardConfig = new DashboardConfigStore(management, config.namespace);
  const monitoringService = new MonitoringService({
    config: dashboardConfig,
    client: management,
    namespace: config.namespace,
    fetch: inputs.fetch,
  });
  const overviewService = new OverviewService(
    connector,
    clusterService,
    aggregationService,
    dashboardConfig,
    config.namespace
  );

  const porchService = new PorchService({
    apiUrl: config.porch.apiUrl,
    transport: inputs.porchTransport ?? new NodePorchTransport(config.porch.skipTlsVerify),
    tokens: new ServiceAccountTokenCache(management),
  });

  return {
    connector,
    users,
    authService,
    keycloakService,
    authorizationService,
    clusterService,
    resourceService,
    aggregationService,
    overviewService,
    monitoringService,
    userSettingService: kv && users ? new UserSettingService(kv, users, authorizationService) : null,
    porchService,
    terminalService: new TerminalService(connector),
    corsOrigin: config.server.corsOrigin,
  };
}
