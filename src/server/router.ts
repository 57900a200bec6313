/**
 * Hono API Router
 *
 * Main router that combines all route modules.
 */

import { createNodeWebSocket } from '@hono/node-ws';
import type { Context, Next } from 'hono';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { adminMiddleware } from '../lib/api/admin-middleware.js';
import { authMiddleware } from '../lib/api/auth-middleware.js';
import { rateLimiter } from '../lib/api/rate-limiter.js';
import { failure } from '../lib/api/response.js';
import type { ClusterConnector } from '../lib/k8s/types.js';
import { MGMT_CLUSTER_NAME } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { AggregationService } from '../services/aggregation.service.js';
import type { AuthService } from '../services/auth.service.js';
import type { AuthorizationService } from '../services/authorization.service.js';
import type { ClusterService } from '../services/cluster.service.js';
import { hasAdminRole, type KeycloakService } from '../services/keycloak.service.js';
import type { MonitoringService } from '../services/monitoring.service.js';
import type { OverviewService } from '../services/overview.service.js';
import type { PorchService } from '../services/porch.service.js';
import type { ResourceService } from '../services/resource.service.js';
import type { TerminalService } from '../services/terminal.service.js';
import type { UserSettingService } from '../services/user-setting.service.js';
import { createAggregatedRoutes } from './routes/aggregated.js';
import { createAuthRoutes } from './routes/auth.js';
import { createClustersRoutes } from './routes/clusters.js';
import { createHealthRoutes } from './routes/health.js';
import { createOverviewRoutes } from './routes/overview.js';
import { createPorchRoutes } from './routes/porch.js';
import { createResourceRoutes } from './routes/resources.js';
import { createSettingsRoutes } from './routes/settings.js';
import { createTerminalRoutes } from './routes/terminal.js';
import { respond } from './shared.js';

const routerLog = createLogger('Router');

/** Routes served without a token. */
export const PUBLIC_PATHS = [
  '/api/healthz',
  '/api/readyz',
  '/api/v1/login',
  '/api/v1/me',
  '/api/v1/init-token',
  '/api/v1/keycloak/*',
];

let requestCounter = 0;

async function requestIdMiddleware(c: Context, next: Next) {
  const id =
    c.req.header('x-request-id') ??
    `req-${Date.now().toString(36)}-${(++requestCounter).toString(36)}`;
  c.set('requestId', id);
  c.header('X-Request-Id', id);
  return next();
}

async function securityHeaders(c: Context, next: Next) {
  await next();
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('X-Frame-Options', 'DENY');
  c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
  if (process.env.NODE_ENV === 'production') {
    c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  }
}

export interface RouterDependencies {
  connector: ClusterConnector;
  authService: AuthService;
  keycloakService: KeycloakService;
  authorizationService: AuthorizationService | null;
  clusterService: ClusterService;
  resourceService: ResourceService;
  aggregationService: AggregationService;
  overviewService: OverviewService;
  monitoringService: MonitoringService;
  userSettingService: UserSettingService | null;
  porchService: PorchService;
  terminalService: TerminalService;
  corsOrigin: string;
}

export function createRouter(deps: RouterDependencies) {
  const app = new Hono();
  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

  const authz = deps.authorizationService;
  const requireAdmin = adminMiddleware({
    hasAdminRole,
    isDashboardAdmin: authz ? (username) => authz.isDashboardAdmin(username) : null,
  });

  app.use(
    '*',
    cors({
      origin: deps.corsOrigin,
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use('*', logger());
  app.use('*', requestIdMiddleware);
  app.use('*', securityHeaders);
  app.use('/api/*', rateLimiter({ max: 200, windowMs: 60_000 }));
  app.use('/api/*', authMiddleware(deps.authService, { publicPaths: PUBLIC_PATHS }));

  app.route('/api', createHealthRoutes({ connector: deps.connector }));
  app.route('/api/v1', createAuthRoutes({ auth: deps.authService, keycloak: deps.keycloakService }));
  app.route('/api/v1/cluster', createClustersRoutes({ clusterService: deps.clusterService }));
  app.route('/api/v1/overview', createOverviewRoutes({ overviewService: deps.overviewService }));
  app.route(
    '/api/v1/setting',
    createSettingsRoutes({
      userSettingService: deps.userSettingService,
      monitoringService: deps.monitoringService,
      isAdmin: (user) => deps.clusterService.isAdmin(user),
    })
  );
  app.route('/api/v1/aggregated', createAggregatedRoutes({ aggregationService: deps.aggregationService }));
  app.route(
    '/api/v1',
    createTerminalRoutes({ terminalService: deps.terminalService, upgradeWebSocket, requireAdmin })
  );

  // Management cluster scope
  const mgmt = new Hono();
  mgmt.use('*', requireAdmin);
  mgmt.get('/overview', async (c) => respond(c, await deps.overviewService.managementOverview()));
  mgmt.route('/porch', createPorchRoutes({ porchService: deps.porchService }));
  mgmt.route(
    '/',
    createResourceRoutes({
      resourceService: deps.resourceService,
      client: () => deps.connector.management(),
      cluster: () => MGMT_CLUSTER_NAME,
    })
  );
  app.route('/api/v1/mgmt-cluster', mgmt);

  // Member cluster scope; the cluster must be registered with Karmada.
  app.use('/api/v1/member/:clustername/*', async (c, next) => {
    const name = c.req.param('clustername');
    const cluster = await deps.clusterService.require(name);
    if (!cluster.ok) {
      routerLog.warn('Unknown member cluster', { requestId: c.get('requestId'), data: { cluster: name } });
      return c.json(failure({ status: 500, message: cluster.error.message }));
    }
    c.set('memberCluster', name);
    return next();
  });

  const memberName = (c: Context) => c.get('memberCluster') ?? '';
  const member = new Hono();
  member.get('/overview', async (c) => respond(c, await deps.overviewService.memberOverview(memberName(c))));
  member.route(
    '/',
    createResourceRoutes({
      resourceService: deps.resourceService,
      client: (c) => deps.connector.member(memberName(c)),
      cluster: memberName,
    })
  );
  app.route('/api/v1/member/:clustername', member);

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    routerLog.error('Unhandled error', { requestId, error: err });

    const message = process.env.NODE_ENV === 'production' ? 'An unexpected error occurred.' : err.message;
    return c.json({ code: 500, message, data: null }, 500);
  });

  app.notFound((c) => c.json({ code: 404, message: 'Route not found', data: null }, 404));

  return { app, injectWebSocket };
}
