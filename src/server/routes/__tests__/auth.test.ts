import { UnsecuredJWT } from 'jose';
import { describe, expect, it } from 'vitest';
import { FakeClusterClient } from '../../../../tests/helpers/fake-cluster.js';
import { createTestApp, jsonRequest } from '../../../../tests/helpers/test-app.js';

describe('auth routes', () => {
  describe('POST /api/v1/login', () => {
    it('issues a token for a stored user', async () => {
      const { app, runtime } = createTestApp();
      await runtime.users?.create('admin', 'admin123', 'admin@example.com', 'admin');

      const res = await app.request('/api/v1/login', jsonRequest('POST', { username: 'admin', password: 'admin123' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        code: 200,
        message: 'success',
        data: { token: expect.any(String), username: 'admin', role: 'admin' },
      });
    });

    it('rejects wrong passwords with 401', async () => {
      const { app, runtime } = createTestApp();
      await runtime.users?.create('admin', 'admin123', 'admin@example.com', 'admin');

      const res = await app.request('/api/v1/login', jsonRequest('POST', { username: 'admin', password: 'wrong' }));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ code: 401, message: 'Invalid username or password', data: null });
    });

    it('needs a username and password', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/login', jsonRequest('POST', { username: 'admin' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ code: 400, message: 'No valid authentication method provided', data: null });
    });
  });

  describe('GET /api/v1/me', () => {
    it('reports a missing token', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/me');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        code: 401,
        message: 'Missing authentication token',
        data: { authenticated: false, initToken: false },
      });
    });

    it('describes the caller', async () => {
      const { app, auth } = createTestApp();

      const res = await app.request('/api/v1/me', { headers: await auth('bob', 'basic_user') });

      expect(await res.json()).toEqual({
        code: 200,
        message: 'success',
        data: { authenticated: true, initToken: false, user: { username: 'bob', name: 'bob', role: 'basic_user' } },
      });
    });
  });

  describe('POST /api/v1/init-token', () => {
    it('stores an accepted token', async () => {
      const { app, connector } = createTestApp();
      connector.tokenClients.set('sa-token', new FakeClusterClient());

      const res = await app.request('/api/v1/init-token', jsonRequest('POST', { token: 'sa-token' }));

      expect(await res.json()).toEqual({
        code: 200,
        message: 'success',
        data: { success: true, message: 'Token initialized successfully' },
      });
    });

    it('reports rejected tokens in the envelope', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/init-token', jsonRequest('POST', { token: 'bad-token' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        code: 400,
        message: 'invalid service account token: Unauthorized',
        data: {},
      });
    });
  });

  describe('Keycloak', () => {
    it('reports itself disabled without a URL', async () => {
      const { app } = createTestApp();

      const config = await app.request('/api/v1/keycloak/config');
      const validate = await app.request('/api/v1/keycloak/validate', jsonRequest('POST', { token: 'x' }));

      expect(await config.json()).toEqual({ code: 200, message: 'success', data: { enabled: false } });
      expect(validate.status).toBe(500);
      expect(await validate.json()).toEqual({ code: 500, message: 'Keycloak authentication not configured', data: null });
    });

    it('validates tokens when enabled', async () => {
      const { app } = createTestApp({ env: { KEYCLOAK_URL: 'https://sso.example' } });
      const token = new UnsecuredJWT({ preferred_username: 'kc-user', realm_access: { roles: ['admin'] } }).encode();

      const res = await app.request('/api/v1/keycloak/validate', jsonRequest('POST', { token }));

      expect(await res.json()).toMatchObject({
        code: 200,
        data: { username: 'kc-user', roles: ['admin'], isAdmin: true },
      });
    });
  });
});
