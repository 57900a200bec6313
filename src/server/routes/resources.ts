/**
 * Resource routes shared by the management and member scopes
 *
 * Specific routes are registered before the generic `/:kind/...` handlers,
 * which Hono tries in registration order.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';
import { failure } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import { ValidationErrors } from '../../lib/errors/validation-errors.js';
import { ARGOCD_KINDS, resolveKind } from '../../lib/k8s/kinds.js';
import { k8sObjectSchema } from '../../lib/k8s/objects.js';
import type { ClusterClient } from '../../lib/k8s/types.js';
import { map } from '../../lib/utils/result.js';
import { ARGOCD_NAMESPACE, normalisePage, type ResourceService } from '../../services/resource.service.js';
import { dataSelect, requireUser, respond, respondWithStatus, validationFailure } from '../shared.js';

const namespaceSchema = z.object({
  name: z.string().trim().min(1),
  skipAutoPropagation: z.boolean().default(false),
});

export interface ResourceRoutesDeps {
  resourceService: ResourceService;
  /** Client for the scope the request addresses. */
  client: (c: Context) => ClusterClient;
  /** Cluster name reported in labels. */
  cluster: (c: Context) => string;
}

export function createResourceRoutes({ resourceService, client, cluster }: ResourceRoutesDeps) {
  const app = new Hono();

  const argoKind = (c: Context) => {
    const type = c.req.param('type') ?? '';
    return ARGOCD_KINDS[type];
  };
  const unknownArgoType = (c: Context) =>
    c.json(
      failure(ValidationErrors.INVALID_ENUM_VALUE('type', c.req.param('type') ?? '', Object.keys(ARGOCD_KINDS)))
    );

  // Namespaces
  app.post('/namespace', async (c) => {
    const body = await parseBody(c.req.raw, namespaceSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await resourceService.createNamespace(client(c), body.value.name, body.value.skipAutoPropagation));
  });

  app.delete('/namespace/:name', async (c) =>
    respond(c, map(await resourceService.deleteObject(client(c), 'namespace', c.req.param('name')), () => ({})))
  );

  app.get('/node/:name/pod', async (c) =>
    respond(c, await resourceService.nodePods(client(c), c.req.param('name'), dataSelect(c)))
  );

  // GET /pod/:namespace/:name/logs?container=&page=
  app.get('/pod/:namespace/:name/logs', async (c) =>
    respond(
      c,
      await resourceService.podLogs(
        client(c),
        c.req.param('namespace'),
        c.req.param('name'),
        c.req.query('container') || undefined,
        normalisePage(c.req.query('page'))
      )
    )
  );

  app.post('/deployment/:namespace/:name/restart', async (c) =>
    respond(c, await resourceService.restartDeployment(client(c), c.req.param('namespace'), c.req.param('name')))
  );

  // Unstructured objects
  app.get('/resource/:kind/:namespace/:name', async (c) => {
    const { kind, namespace, name } = c.req.param();
    return respond(c, await resourceService.getObject(client(c), kind, name, namespace));
  });

  app.put('/resource/:kind/:namespace/:name', async (c) => {
    const { kind, namespace, name } = c.req.param();
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await resourceService.replaceObject(client(c), kind, name, body.value, namespace));
  });

  app.delete('/resource/:kind/:namespace/:name', async (c) => {
    const { kind, namespace, name } = c.req.param();
    return respond(c, map(await resourceService.deleteObject(client(c), kind, name, namespace), () => ({})));
  });

  app.post('/resource/:kind/:namespace', async (c) => {
    const { kind, namespace } = c.req.param();
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await resourceService.createObject(client(c), kind, body.value, namespace));
  });

  app.post('/resource/:kind', async (c) => {
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await resourceService.createObject(client(c), c.req.param('kind'), body.value));
  });

  // Argo CD
  app.post('/argocd/application/:name/sync', async (c) => {
    const user = requireUser(c);
    if (!user.ok) return respondWithStatus(user.error);
    return respond(c, await resourceService.syncApplication(client(c), c.req.param('name'), user.value.username));
  });

  app.get('/argocd/:type', async (c) => {
    const kind = argoKind(c);
    if (!kind) return unknownArgoType(c);
    return respond(c, await resourceService.list(client(c), kind, dataSelect(c), ARGOCD_NAMESPACE));
  });

  app.post('/argocd/:type', async (c) => {
    const kind = argoKind(c);
    if (!kind) return unknownArgoType(c);
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await resourceService.createObject(client(c), kind, body.value, ARGOCD_NAMESPACE));
  });

  app.get('/argocd/:type/:name', async (c) => {
    const kind = argoKind(c);
    if (!kind) return unknownArgoType(c);
    return respond(c, await resourceService.getObject(client(c), kind, c.req.param('name'), ARGOCD_NAMESPACE));
  });

  app.put('/argocd/:type/:name', async (c) => {
    const kind = argoKind(c);
    if (!kind) return unknownArgoType(c);
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(
      c,
      await resourceService.replaceObject(client(c), kind, c.req.param('name'), body.value, ARGOCD_NAMESPACE)
    );
  });

  app.delete('/argocd/:type/:name', async (c) => {
    const kind = argoKind(c);
    if (!kind) return unknownArgoType(c);
    const deleted = await resourceService.deleteObject(client(c), kind, c.req.param('name'), ARGOCD_NAMESPACE);
    return respond(c, map(deleted, () => ({})));
  });

  // Custom resources
  app.get('/customresource/definition', async (c) =>
    respond(c, await resourceService.listCrds(client(c), cluster(c), c.req.query('groupBy')))
  );

  app.get('/customresource/definition/:name', async (c) =>
    respond(c, await resourceService.getObject(client(c), 'customresourcedefinition', c.req.param('name')))
  );

  app.put('/customresource/definition/:name', async (c) => {
    const body = await parseBody(c.req.raw, k8sObjectSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(
      c,
      await resourceService.replaceObject(client(c), 'customresourcedefinition', c.req.param('name'), body.value)
    );
  });

  // GET /customresource/resource?group=&crd=&namespace=
  app.get('/customresource/resource', async (c) => {
    const group = c.req.query('group');
    const crd = c.req.query('crd');
    if (!group) return c.json(failure(ValidationErrors.MISSING_REQUIRED_FIELD('group')));
    if (!crd) return c.json(failure(ValidationErrors.MISSING_REQUIRED_FIELD('crd')));
    return respond(
      c,
      await resourceService.listCustomResources(client(c), cluster(c), group, crd, c.req.query('namespace') || undefined)
    );
  });

  // Generic kinds
  app.get('/:kind', async (c) => respond(c, await resourceService.list(client(c), c.req.param('kind'), dataSelect(c))));

  // Namespaced kinds list a namespace; cluster-scoped kinds read one object.
  app.get('/:kind/:target', async (c) => {
    const { kind: key, target } = c.req.param();
    if (resolveKind(key).namespaced) {
      return respond(c, await resourceService.list(client(c), key, dataSelect(c), target));
    }
    return respond(c, await resourceService.detail(client(c), key, target));
  });

  app.get('/:kind/:target/:name', async (c) => {
    const { kind: key, target, name } = c.req.param();
    if (!resolveKind(key).namespaced && name === 'event') {
      return respond(c, await resourceService.events(client(c), target, dataSelect(c)));
    }
    return respond(c, await resourceService.detail(client(c), key, name, target));
  });

  app.get('/:kind/:namespace/:name/event', async (c) => {
    const { namespace, name } = c.req.param();
    return respond(c, await resourceService.events(client(c), name, dataSelect(c), namespace));
  });

  return app;
}
