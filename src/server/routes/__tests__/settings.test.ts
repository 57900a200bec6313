import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestApp, jsonRequest } from '../../../../tests/helpers/test-app.js';
import { defaultSetting } from '../../../services/user-setting.service.js';

describe('setting routes', () => {
  let t: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    t = createTestApp();
  });

  it('returns the caller their own setting', async () => {
    const res = await t.app.request('/api/v1/setting', { headers: await t.auth('bob', 'basic_user') });

    expect(await res.json()).toEqual({ code: 200, message: 'success', data: defaultSetting('bob') });
  });

  it('needs an admin to read another user', async () => {
    const denied = await t.app.request('/api/v1/setting?username=carol', { headers: await t.auth('bob', 'basic_user') });
    const allowed = await t.app.request('/api/v1/setting?username=carol', { headers: await t.auth() });

    expect(denied.status).toBe(403);
    expect(await denied.json()).toEqual({ code: 403, message: 'insufficient privileges: admin role required', data: null });
    expect(await allowed.json()).toEqual({ code: 200, message: 'success', data: defaultSetting('carol') });
  });

  it('creates users through their setting and lists them for admins', async () => {
    const headers = await t.auth();

    const created = await t.app.request(
      '/api/v1/setting',
      jsonRequest('POST', { username: 'carol', password: 'pw', displayName: 'Carol' }, headers)
    );
    const users = await t.app.request('/api/v1/setting/users', { headers });

    expect(await created.json()).toMatchObject({ code: 200, data: { username: 'carol', displayName: 'Carol' } });
    expect(await users.json()).toMatchObject({ code: 200, data: [{ username: 'carol', displayName: 'Carol' }] });
  });

  it('does not let basic users make themselves admin', async () => {
    const headers = await t.auth('mallory', 'basic_user');

    const res = await t.app.request(
      '/api/v1/setting',
      jsonRequest('POST', { password: 'pw12345', preferences: { role: 'admin' } }, headers)
    );
    const mgmt = await t.app.request('/api/v1/mgmt-cluster/namespace', { headers });

    expect(await res.json()).toEqual({
      code: 403,
      message: 'changing roles or cluster permissions requires the admin role',
      data: {},
    });
    expect(t.relations?.has('mallory', 'admin', 'dashboard:dashboard')).toBe(false);
    expect(mgmt.status).toBe(403);
  });

  it('lets admins change roles', async () => {
    const res = await t.app.request(
      '/api/v1/setting',
      jsonRequest('POST', { username: 'carol', password: 'pw', preferences: { role: 'admin' } }, await t.auth())
    );

    expect(await res.json()).toMatchObject({ code: 200, data: { username: 'carol', preferences: { role: 'admin' } } });
    expect(t.relations?.has('carol', 'admin', 'dashboard:dashboard')).toBe(true);
  });

  it('keeps the user list from basic users', async () => {
    const res = await t.app.request('/api/v1/setting/users', { headers: await t.auth('bob', 'basic_user') });
    expect(res.status).toBe(403);
  });

  it('deletes a setting', async () => {
    const headers = await t.auth();
    await t.app.request('/api/v1/setting', jsonRequest('POST', { username: 'carol', password: 'pw' }, headers));

    const res = await t.app.request('/api/v1/setting?username=carol', { method: 'DELETE', headers });

    expect(await res.json()).toEqual({
      code: 200,
      message: 'success',
      data: { message: 'User settings deleted successfully' },
    });
  });

  it('reports an unavailable store', async () => {
    const offline = createTestApp({ kv: null });

    const res = await offline.app.request('/api/v1/setting', { headers: await offline.auth() });

    expect(await res.json()).toEqual({ code: 503, message: 'user store is not available', data: {} });
  });

  describe('monitoring sources', () => {
    const grafana = { name: 'Main', endpoint: 'https://grafana.example', token: 'test-token' };

    it('adds a Grafana source and searches its dashboards', async () => {
      const dashboards = [{ id: 1, uid: 'u1', title: 'Nodes', url: '/d/u1/nodes', type: 'dash-db' }];
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(JSON.stringify(dashboards)));
      const app = createTestApp({ fetch: fetchMock });
      const headers = await app.auth();

      const added = await app.app.request('/api/v1/setting/monitoring/grafana', jsonRequest('POST', grafana, headers));
      const listed = await app.app.request('/api/v1/setting/monitoring', { headers });
      const searched = await app.app.request('/api/v1/setting/monitoring/Main/dashboards', { headers });

      expect(await added.json()).toEqual({
        code: 200,
        message: 'success',
        data: { message: 'Grafana configuration added successfully' },
      });
      expect(await listed.json()).toEqual({
        code: 200,
        message: 'success',
        data: { monitorings: [{ name: 'Main', type: 'grafana', endpoint: 'https://grafana.example', token: 'test-token' }] },
      });
      expect(await searched.json()).toEqual({ code: 200, message: 'success', data: { dashboards } });
    });

    it('validates the source', async () => {
      const res = await t.app.request(
        '/api/v1/setting/monitoring/grafana',
        jsonRequest('POST', { ...grafana, endpoint: 'not a url' }, await t.auth())
      );
      expect(await res.json()).toMatchObject({ code: 400, data: {} });
    });

    it('needs the endpoint to delete', async () => {
      const res = await t.app.request('/api/v1/setting/monitoring/source/Main', {
        method: 'DELETE',
        headers: await t.auth(),
      });
      expect(await res.json()).toEqual({ code: 400, message: 'endpoint is required', data: {} });
    });
  });
});
