/**
 * Liveness and readiness checks
 */

import { Hono } from 'hono';
import type { ClusterConnector } from '../../lib/k8s/types.js';
import { createLogger } from '../../lib/logging/logger.js';

const log = createLogger('Health');

interface HealthDeps {
  connector: ClusterConnector;
}

export function createHealthRoutes({ connector }: HealthDeps) {
  const app = new Hono();

  app.get('/healthz', (c) => c.json({ ok: true, status: 'alive' }));

  // Ready once the Karmada API server answers a version request.
  app.get('/readyz', async (c) => {
    try {
      await connector.karmada().serverVersion();
      return c.json({ ok: true, status: 'ready' });
    } catch (error) {
      log.warn('Readiness check failed', { error });
      return c.json({ ok: false, status: 'not_ready' }, 503);
    }
  });

  return app;
}
