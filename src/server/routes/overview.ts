/**
 * Control-plane overview and widgets
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { failure } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import { ValidationErrors } from '../../lib/errors/validation-errors.js';
import type { OverviewService } from '../../services/overview.service.js';
import { respond, validationFailure } from '../shared.js';

const dashboardSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().min(1),
});

interface OverviewDeps {
  overviewService: OverviewService;
}

export function createOverviewRoutes({ overviewService }: OverviewDeps) {
  const app = new Hono();

  // GET /api/v1/overview
  app.get('/', async (c) => respond(c, await overviewService.overview()));

  app.get('/gpu', async (c) => respond(c, await overviewService.gpuSummary()));

  // POST /api/v1/overview/monitoring/dashboard
  app.post('/monitoring/dashboard', async (c) => {
    const body = await parseBody(c.req.raw, dashboardSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await overviewService.saveDashboard(body.value));
  });

  // DELETE /api/v1/overview/monitoring/dashboard/:name?url=
  app.delete('/monitoring/dashboard/:name', async (c) => {
    const url = c.req.query('url');
    if (!url) return c.json(failure(ValidationErrors.MISSING_REQUIRED_FIELD('url')));
    return respond(c, await overviewService.deleteDashboard(c.req.param('name'), url));
  });

  return app;
}
