/**
 * Lists merged across every ready member cluster
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { failure } from '../../lib/api/response.js';
import { ValidationErrors } from '../../lib/errors/validation-errors.js';
import { ARGOCD_KINDS, aggregatedKinds, findKind, resolveKind } from '../../lib/k8s/kinds.js';
import type { AggregationService } from '../../services/aggregation.service.js';
import { dataSelect, respond } from '../shared.js';

interface AggregatedDeps {
  aggregationService: AggregationService;
}

export function createAggregatedRoutes({ aggregationService }: AggregatedDeps) {
  const app = new Hono();

  app.get('/customresource/apiVersion', async (c) => respond(c, await aggregationService.apiVersions()));

  app.get('/customresource/definition', async (c) =>
    respond(c, await aggregationService.definitions(c.req.query('groupBy')))
  );

  // GET /api/v1/aggregated/customresource?group=&crd=
  app.get('/customresource', async (c) =>
    respond(
      c,
      await aggregationService.customResources({
        group: c.req.query('group') || undefined,
        crd: c.req.query('crd') || undefined,
      })
    )
  );

  // GET /api/v1/aggregated/argocd/{project|application|applicationset}
  app.get('/argocd/:type', async (c) => {
    const type = c.req.param('type');
    const key = ARGOCD_KINDS[type];
    if (!key) return c.json(failure(ValidationErrors.INVALID_ENUM_VALUE('type', type, Object.keys(ARGOCD_KINDS))));
    return respond(c, await aggregationService.argoObjects(resolveKind(key)));
  });

  async function list(c: Context, key: string, namespace?: string) {
    const kind = findKind(key);
    if (!kind?.aggregated) {
      const allowed = aggregatedKinds().map((entry) => entry.key);
      return c.json(failure(ValidationErrors.INVALID_ENUM_VALUE('kind', key, allowed)));
    }
    return respond(c, await aggregationService.list(kind, dataSelect(c), namespace));
  }

  app.get('/:kind', (c) => list(c, c.req.param('kind')));
  app.get('/:kind/:namespace', (c) => list(c, c.req.param('kind'), c.req.param('namespace')));

  return app;
}
