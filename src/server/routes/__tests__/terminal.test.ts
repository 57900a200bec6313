import { describe, expect, it } from 'vitest';
import { createTestApp } from '../../../../tests/helpers/test-app.js';

describe('terminal routes', () => {
  it('needs namespace and pod', async () => {
    const t = createTestApp();

    const res = await t.app.request('/api/v1/terminal?namespace=default&cluster=member1', { headers: await t.auth() });

    expect(await res.json()).toEqual({ code: 400, message: 'namespace and pod parameters are required', data: {} });
  });

  it('needs a cluster', async () => {
    const t = createTestApp();

    const res = await t.app.request('/api/v1/terminal?namespace=default&pod=web-1', { headers: await t.auth() });

    expect(await res.json()).toEqual({ code: 400, message: 'cluster parameter is required', data: {} });
  });

  it('needs a node for node shells', async () => {
    const t = createTestApp();

    const res = await t.app.request('/api/v1/node-terminal?cluster=member1', { headers: await t.auth() });

    expect(await res.json()).toEqual({ code: 400, message: 'node parameter is required', data: {} });
  });

  it('keeps management cluster shells for administrators', async () => {
    const t = createTestApp();

    const res = await t.app.request('/api/v1/node-terminal?cluster=mgmt-cluster&node=cp-1', {
      headers: await t.auth('bob', 'basic_user'),
    });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      code: 403,
      message: 'Administrator permissions required for management cluster access',
      data: null,
    });
  });
});
