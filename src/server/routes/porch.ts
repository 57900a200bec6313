/**
 * Porch package API proxy (management scope)
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { failure } from '../../lib/api/response.js';
import type { PorchResource, PorchService } from '../../services/porch.service.js';
import { rawBody } from '../shared.js';

const PROXIED_METHODS = ['GET', 'POST', 'PUT', 'DELETE'];

interface PorchDeps {
  porchService: PorchService;
}

export function createPorchRoutes({ porchService }: PorchDeps) {
  const app = new Hono();

  async function relay(c: Context, resource: PorchResource, name: string | undefined) {
    const result = await porchService.proxy(resource, name, {
      method: c.req.method,
      headers: c.req.raw.headers,
      search: new URL(c.req.url).search,
      body: await rawBody(c),
    });
    if (!result.ok) return c.json(failure(result.error));
    const { status, headers, body } = result.value;
    return new Response(body.byteLength > 0 ? body : null, { status, headers });
  }

  for (const resource of ['repository', 'packagerevision'] as const) {
    app.on(PROXIED_METHODS, `/${resource}`, (c) => relay(c, resource, undefined));
    app.on(PROXIED_METHODS, `/${resource}/:name`, (c) => relay(c, resource, c.req.param('name')));
  }

  app.get('/packagerevisionresources/:name', (c) => relay(c, 'packagerevisionresources', c.req.param('name')));

  return app;
}
