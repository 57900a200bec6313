/**
 * Karmada cluster routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { success } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import { map } from '../../lib/utils/result.js';
import type { ClusterService } from '../../services/cluster.service.js';
import { dataSelect, requireUser, respond, respondWithStatus, validationFailure } from '../shared.js';

const clusterUpdateSchema = z.object({
  labels: z.array(z.object({ key: z.string().min(1), value: z.string().default('') })).optional(),
  taints: z
    .array(
      z.object({
        key: z.string().min(1),
        value: z.string().optional(),
        effect: z.enum(['NoSchedule', 'PreferNoSchedule', 'NoExecute']),
      })
    )
    .optional(),
});

const clusterUsersSchema = z.object({
  users: z.array(z.object({ username: z.string().min(1), roles: z.array(z.string()).default([]) })).default([]),
});

interface ClustersDeps {
  clusterService: ClusterService;
}

export function createClustersRoutes({ clusterService }: ClustersDeps) {
  const app = new Hono();

  // GET /api/v1/cluster
  app.get('/', async (c) => respond(c, await clusterService.list(c.get('user'), dataSelect(c))));

  app.get('/:name', async (c) => respond(c, await clusterService.get(c.req.param('name'))));

  // PUT /api/v1/cluster/:name
  app.put('/:name', async (c) => {
    const body = await parseBody(c.req.raw, clusterUpdateSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await clusterService.update(c.req.param('name'), body.value));
  });

  app.delete('/:name', async (c) => {
    const result = await clusterService.delete(c.req.param('name'));
    return respond(c, map(result, () => ({})));
  });

  // GET /api/v1/cluster/:name/users
  app.get('/:name/users', async (c) => {
    const user = requireUser(c);
    if (!user.ok) return respondWithStatus(user.error);
    const name = c.req.param('name');

    const allowed = await clusterService.authorizeUserAccess(user.value, name, 'view');
    if (!allowed.ok) return respondWithStatus(allowed.error);

    const users = await clusterService.clusterUsers(name);
    if (!users.ok) return respondWithStatus(users.error);
    return c.json(success(users.value));
  });

  // PUT /api/v1/cluster/:name/users
  app.put('/:name/users', async (c) => {
    const user = requireUser(c);
    if (!user.ok) return respondWithStatus(user.error);
    const name = c.req.param('name');

    const allowed = await clusterService.authorizeUserAccess(user.value, name, 'manage');
    if (!allowed.ok) return respondWithStatus(allowed.error);

    const body = await parseBody(c.req.raw, clusterUsersSchema);
    if (!body.ok) return respondWithStatus(body.error);

    const updated = await clusterService.updateClusterUsers(name, body.value.users);
    if (!updated.ok) return respondWithStatus(updated.error);
    return c.json(success(updated.value));
  });

  return app;
}
