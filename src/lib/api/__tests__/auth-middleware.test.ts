import { Hono } from 'hono';
import { describe, expect, it, vi } from 'vitest';
import { AuthErrors } from '../../errors/auth-errors.js';
import { err, ok } from '../../utils/result.js';
import { type AuthUser, type Authenticator, authMiddleware, bearerToken } from '../auth-middleware.js';

const alice: AuthUser = { username: 'alice', role: 'user', source: 'jwt', roles: [] };

function createApp(authenticator: Authenticator) {
  const app = new Hono();
  app.use('/api/*', authMiddleware(authenticator, { publicPaths: ['/api/healthz', '/api/v1/keycloak/*'] }));
  app.get('/api/healthz', (c) => c.json({ ok: true }));
  app.get('/api/v1/keycloak/config', (c) => c.json({ ok: true }));
  app.get('/api/v1/whoami', (c) => c.json({ user: c.get('user')?.username ?? null }));
  return app;
}

describe('bearerToken', () => {
  it('extracts the token', () => {
    expect(bearerToken('Bearer abc.def')).toBe('abc.def');
    expect(bearerToken('bearer   xyz ')).toBe('xyz');
  });

  it('ignores other schemes', () => {
    expect(bearerToken('Basic dXNlcg==')).toBeUndefined();
    expect(bearerToken(undefined)).toBeUndefined();
  });
});

describe('authMiddleware', () => {
  it('lets public paths through without a token', async () => {
    const authenticate = vi.fn();
    const app = createApp({ authenticate });

    expect((await app.request('/api/healthz')).status).toBe(200);
    expect((await app.request('/api/v1/keycloak/config')).status).toBe(200);
    expect(authenticate).not.toHaveBeenCalled();
  });

  it('rejects requests without a token', async () => {
    const app = createApp({ authenticate: vi.fn() });

    const res = await app.request('/api/v1/whoami');

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ code: 401, message: 'Missing authentication token', data: null });
  });

  it('rejects tokens the authenticator refuses', async () => {
    const app = createApp({ authenticate: vi.fn().mockResolvedValue(err(AuthErrors.INVALID_TOKEN)) });

    const res = await app.request('/api/v1/whoami', { headers: { Authorization: 'Bearer bad' } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ code: 401, message: 'Invalid authentication token', data: null });
  });

  it('stores the authenticated user', async () => {
    const authenticate = vi.fn().mockResolvedValue(ok(alice));
    const app = createApp({ authenticate });

    const res = await app.request('/api/v1/whoami', { headers: { Authorization: 'Bearer good' } });

    expect(await res.json()).toEqual({ user: 'alice' });
    expect(authenticate).toHaveBeenCalledWith('good');
  });

  it('accepts the token as a query parameter', async () => {
    const authenticate = vi.fn().mockResolvedValue(ok(alice));
    const app = createApp({ authenticate });

    const res = await app.request('/api/v1/whoami?token=from-query');

    expect(res.status).toBe(200);
    expect(authenticate).toHaveBeenCalledWith('from-query');
  });
});
