/**
 * User setting routes
 *
 * A caller manages their own setting; acting on another user's setting,
 * or changing a role or cluster permission, needs a dashboard admin.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import type { AuthUser } from '../../lib/api/auth-middleware.js';
import { failure, success } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import type { AppError } from '../../lib/errors/base.js';
import { AuthErrors } from '../../lib/errors/auth-errors.js';
import { SettingErrors } from '../../lib/errors/setting-errors.js';
import type { Result } from '../../lib/utils/result.js';
import { err, ok } from '../../lib/utils/result.js';
import type { MonitoringService } from '../../services/monitoring.service.js';
import { type UserSettingService, userSettingSchema } from '../../services/user-setting.service.js';
import { requireUser, respond, respondWithStatus, validationFailure } from '../shared.js';
import { createMonitoringRoutes } from './monitoring.js';

interface SettingsDeps {
  /** Null when etcd is unreachable. */
  userSettingService: UserSettingService | null;
  monitoringService: MonitoringService;
  isAdmin: (user: AuthUser) => Promise<boolean>;
}

export function createSettingsRoutes({ userSettingService, monitoringService, isAdmin }: SettingsDeps) {
  const app = new Hono();

  const isPrivileged = async (user: AuthUser) => user.role === 'admin' || (await isAdmin(user));

  /** The user a request acts on: `requested`, or the caller when absent. */
  async function targetUser(
    c: Context,
    requested: string | undefined
  ): Promise<Result<{ username: string; privileged: boolean }, AppError>> {
    const user = requireUser(c);
    if (!user.ok) return user;
    const username = requested || user.value.username;
    const privileged = await isPrivileged(user.value);
    if (username !== user.value.username && !privileged) {
      return err(AuthErrors.INSUFFICIENT_PRIVILEGES);
    }
    return ok({ username, privileged });
  }

  app.route('/monitoring', createMonitoringRoutes({ monitoringService }));

  // GET /api/v1/setting/users
  app.get('/users', async (c) => {
    const user = requireUser(c);
    if (!user.ok) return respondWithStatus(user.error);
    if (!(await isPrivileged(user.value))) return respondWithStatus(AuthErrors.INSUFFICIENT_PRIVILEGES);
    if (!userSettingService) return respondWithStatus(SettingErrors.STORE_UNAVAILABLE);

    const users = await userSettingService.listUsers();
    if (!users.ok) return respondWithStatus(users.error);
    return c.json(success(users.value));
  });

  // GET /api/v1/setting?username=
  app.get('/', async (c) => {
    if (!userSettingService) return c.json(failure(SettingErrors.STORE_UNAVAILABLE));
    const target = await targetUser(c, c.req.query('username'));
    if (!target.ok) return respondWithStatus(target.error);
    return respond(c, await userSettingService.get(target.value.username));
  });

  // POST /api/v1/setting
  app.post('/', async (c) => {
    if (!userSettingService) return c.json(failure(SettingErrors.STORE_UNAVAILABLE));
    const body = await parseBody(c.req.raw, userSettingSchema);
    if (!body.ok) return validationFailure(c, body.error);
    const target = await targetUser(c, body.value.username);
    if (!target.ok) return respondWithStatus(target.error);
    const { username, privileged } = target.value;
    return respond(c, await userSettingService.create({ ...body.value, username }, { privileged }));
  });

  // PUT /api/v1/setting
  app.put('/', async (c) => {
    if (!userSettingService) return c.json(failure(SettingErrors.STORE_UNAVAILABLE));
    const body = await parseBody(c.req.raw, userSettingSchema);
    if (!body.ok) return validationFailure(c, body.error);
    const target = await targetUser(c, body.value.username);
    if (!target.ok) return respondWithStatus(target.error);
    const { username, privileged } = target.value;
    return respond(c, await userSettingService.update({ ...body.value, username }, { privileged }));
  });

  // DELETE /api/v1/setting?username=
  app.delete('/', async (c) => {
    if (!userSettingService) return c.json(failure(SettingErrors.STORE_UNAVAILABLE));
    const target = await targetUser(c, c.req.query('username'));
    if (!target.ok) return respondWithStatus(target.error);
    const deleted = await userSettingService.delete(target.value.username);
    if (!deleted.ok) return c.json(failure(deleted.error));
    return c.json(success({ message: 'User settings deleted successfully' }));
  });

  return app;
}
