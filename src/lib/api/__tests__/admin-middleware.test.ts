import { Hono } from 'hono';
import { describe, expect, it, vi } from 'vitest';
import { AuthErrors } from '../../errors/auth-errors.js';
import { err, ok } from '../../utils/result.js';
import { type AdminCheck, adminMiddleware } from '../admin-middleware.js';
import type { AuthUser } from '../auth-middleware.js';

function createApp(check: AdminCheck, user?: AuthUser) {
  const app = new Hono();
  app.use('*', async (c, next) => {
    c.set('user', user);
    return next();
  });
  app.use('*', adminMiddleware(check));
  app.get('/mgmt', (c) => c.json({ ok: true }));
  return app;
}

const bob: AuthUser = { username: 'bob', role: 'user', source: 'jwt', roles: [] };
const noRoles = () => false;

describe('adminMiddleware', () => {
  it('requires a user', async () => {
    const res = await createApp({ hasAdminRole: noRoles, isDashboardAdmin: null }).request('/mgmt');

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ code: 401, message: 'Authentication required', data: null });
  });

  it('admits admin roles without asking the relation store', async () => {
    const isDashboardAdmin = vi.fn();
    const keycloakAdmin: AuthUser = { ...bob, source: 'keycloak', roles: ['platform-admin'] };
    const app = createApp({ hasAdminRole: (roles) => roles.includes('platform-admin'), isDashboardAdmin }, keycloakAdmin);

    expect((await app.request('/mgmt')).status).toBe(200);
    expect(isDashboardAdmin).not.toHaveBeenCalled();
  });

  it('fails when authorization is not configured', async () => {
    const res = await createApp({ hasAdminRole: noRoles, isDashboardAdmin: null }, bob).request('/mgmt');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ code: 500, message: 'Authorization service is not available', data: null });
  });

  it('admits dashboard admins', async () => {
    const app = createApp({ hasAdminRole: noRoles, isDashboardAdmin: vi.fn().mockResolvedValue(ok(true)) }, bob);
    expect((await app.request('/mgmt')).status).toBe(200);
  });

  it('forbids everyone else', async () => {
    const app = createApp({ hasAdminRole: noRoles, isDashboardAdmin: vi.fn().mockResolvedValue(ok(false)) }, bob);

    const res = await app.request('/mgmt');

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      code: 403,
      message: 'Administrator permissions required for management cluster access',
      data: null,
    });
  });

  it('reports failed checks with their status', async () => {
    const failed = err(AuthErrors.PERMISSION_CHECK_FAILED('store down'));
    const app = createApp({ hasAdminRole: noRoles, isDashboardAdmin: vi.fn().mockResolvedValue(failed) }, bob);

    const res = await app.request('/mgmt');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ code: 500, message: 'failed to check permissions: store down', data: null });
  });
});
