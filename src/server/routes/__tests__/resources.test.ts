import { beforeEach, describe, expect, it } from 'vitest';
import { clusterObject, type FakeClusterClient, podObject } from '../../../../tests/helpers/fake-cluster.js';
import { createTestApp, jsonRequest } from '../../../../tests/helpers/test-app.js';
import { Kinds } from '../../../lib/k8s/kinds.js';

const BASE = '/api/v1/member/member1';

describe('resource routes', () => {
  let t: ReturnType<typeof createTestApp>;
  let member: FakeClusterClient;
  let headers: Record<string, string>;

  const get = async (path: string) => (await t.app.request(`${BASE}${path}`, { headers })).json();
  const send = async (method: string, path: string, body: unknown) =>
    (await t.app.request(`${BASE}${path}`, jsonRequest(method, body, headers))).json();

  beforeEach(async () => {
    t = createTestApp();
    t.connector.karmada().seed(clusterObject('member1'));
    member = t.connector.member('member1');
    member
      .seed({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'web', namespace: 'default' },
        spec: {
          replicas: 1,
          selector: { matchLabels: { app: 'web' } },
          template: { metadata: {}, spec: { containers: [{ name: 'web', image: 'nginx:1' }] } },
        },
      })
      .seed(podObject('default', 'web-1', { labels: { app: 'web' }, nodeName: 'node-1' }))
      .seed({ apiVersion: 'v1', kind: 'Node', metadata: { name: 'node-1' } })
      .seed({
        apiVersion: 'v1',
        kind: 'Event',
        metadata: { name: 'web.1', namespace: 'default' },
        involvedObject: { name: 'web' },
      });
    headers = await t.auth();
  });

  it('lists a namespaced kind in one namespace', async () => {
    expect(await get('/deployment/default')).toMatchObject({
      code: 200,
      data: { listMeta: { totalItems: 1 }, deployments: [{ objectMeta: { name: 'web' } }] },
    });
  });

  it('reads deployment details with their pods', async () => {
    expect(await get('/deployment/default/web')).toMatchObject({
      code: 200,
      data: { objectMeta: { name: 'web' }, podList: { listMeta: { totalItems: 1 } } },
    });
  });

  it('reads cluster-scoped objects by name', async () => {
    expect(await get('/node/node-1')).toMatchObject({ code: 200, data: { objectMeta: { name: 'node-1' } } });
  });

  it('lists pods on a node and events of an object', async () => {
    expect(await get('/node/node-1/pod')).toMatchObject({ data: { listMeta: { totalItems: 1 } } });
    expect(await get('/deployment/default/web/event')).toMatchObject({
      data: { events: [{ objectMeta: { name: 'web.1' } }] },
    });
  });

  it('pages pod logs', async () => {
    member.logs.set('default/web-1', 'started\n');

    expect(await get('/pod/default/web-1/logs?page=1')).toEqual({
      code: 200,
      message: 'success',
      data: { logs: 'started\n', page: 1, totalPages: 1, totalLines: 1 },
    });
  });

  it('creates namespaces', async () => {
    const body = await send('POST', '/namespace', { name: 'team', skipAutoPropagation: true });

    expect(body).toMatchObject({
      code: 200,
      data: { metadata: { name: 'team', labels: { 'namespace.karmada.io/skip-auto-propagation': 'true' } } },
    });
  });

  it('creates objects in the route namespace', async () => {
    await send('POST', '/resource/configmap/team', { metadata: { name: 'cfg' }, data: { a: '1' } });

    const stored = await member.get(Kinds.configMap, 'cfg', 'team');
    expect(stored.metadata).toEqual({ name: 'cfg', namespace: 'team' });
  });

  it('rejects a replacement under another name', async () => {
    const body = await send('PUT', '/resource/deployment/default/web', { metadata: { name: 'api' } });
    expect(body).toMatchObject({ code: 400, message: 'Validation failed', data: {} });
  });

  it('deletes objects with an empty payload', async () => {
    const res = await t.app.request(`${BASE}/resource/pod/default/web-1`, { method: 'DELETE', headers });
    expect(await res.json()).toEqual({ code: 200, message: 'success', data: {} });
  });

  it('restarts deployments', async () => {
    expect(await send('POST', '/deployment/default/web/restart', {})).toMatchObject({
      code: 200,
      data: { message: 'Deployment restarted successfully' },
    });
  });

  describe('Argo CD', () => {
    beforeEach(() => {
      member
        .seed({ apiVersion: 'argoproj.io/v1alpha1', kind: 'AppProject', metadata: { name: 'default', namespace: 'argocd' } })
        .seed({ apiVersion: 'argoproj.io/v1alpha1', kind: 'Application', metadata: { name: 'shop', namespace: 'argocd' } });
    });

    it('lists projects', async () => {
      expect(await get('/argocd/project')).toMatchObject({ code: 200, data: { listMeta: { totalItems: 1 } } });
    });

    it('rejects unknown types', async () => {
      expect(await get('/argocd/widget')).toEqual({ code: 400, message: 'Invalid value "widget" for "type"', data: {} });
    });

    it('syncs an application as the caller', async () => {
      expect(await send('POST', '/argocd/application/shop/sync', {})).toMatchObject({
        code: 200,
        data: { operation: { initiatedBy: { username: 'admin' } } },
      });
    });
  });

  it('requires group and crd for custom resources', async () => {
    expect(await get('/customresource/resource?crd=widgets.example.io')).toEqual({
      code: 400,
      message: 'group is required',
      data: {},
    });
  });
});
