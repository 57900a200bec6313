/**
 * Grafana monitoring sources
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { failure } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import { ValidationErrors } from '../../lib/errors/validation-errors.js';
import type { MonitoringService } from '../../services/monitoring.service.js';
import { respond, validationFailure } from '../shared.js';

const grafanaSchema = z.object({
  name: z.string().trim().min(1),
  endpoint: z.string().trim().url(),
  token: z.string().min(1),
});

interface MonitoringDeps {
  monitoringService: MonitoringService;
}

export function createMonitoringRoutes({ monitoringService }: MonitoringDeps) {
  const app = new Hono();

  // GET /api/v1/setting/monitoring
  app.get('/', async (c) => respond(c, await monitoringService.list()));

  // POST /api/v1/setting/monitoring/grafana
  app.post('/grafana', async (c) => {
    const body = await parseBody(c.req.raw, grafanaSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await monitoringService.addGrafana(body.value));
  });

  app.get('/:name/dashboards', async (c) => respond(c, await monitoringService.dashboards(c.req.param('name'))));

  // DELETE /api/v1/setting/monitoring/source/:name?endpoint=
  app.delete('/source/:name', async (c) => {
    const endpoint = c.req.query('endpoint');
    if (!endpoint) return c.json(failure(ValidationErrors.MISSING_REQUIRED_FIELD('endpoint')));
    return respond(c, await monitoringService.deleteSource(c.req.param('name'), endpoint));
  });

  return app;
}
