import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { FakeClusterClient } from '../../../tests/helpers/fake-cluster.js';
import { Kinds } from '../../lib/k8s/kinds.js';
import { DashboardConfigStore } from '../dashboard-config.service.js';
import { formatLabelValue, MonitoringService, randomSuffix, secretToken } from '../monitoring.service.js';

const NAMESPACE = 'karmada-system';
const GRAFANA = { name: 'Main Grafana', endpoint: 'https://grafana.example/', token: 'test-token' };

describe('monitoring helpers', () => {
  it('formats names as label values', () => {
    expect(formatLabelValue('Main Grafana')).toBe('Main-Grafana');
    expect(formatLabelValue('/team grafana ')).toBe('x-team-grafana-x');
  });

  it('starts random suffixes with a letter', () => {
    expect(randomSuffix(4, (max) => max - 1)).toBe('z999');
  });

  it('reads tokens from data or stringData', () => {
    expect(secretToken({ data: { token: Buffer.from('test').toString('base64') } })).toBe('test');
    expect(secretToken({ stringData: { token: 'plain' } })).toBe('plain');
    expect(secretToken({})).toBeUndefined();
  });
});

describe('MonitoringService', () => {
  let client: FakeClusterClient;
  let fetchMock: Mock<typeof fetch>;
  let service: MonitoringService;

  beforeEach(() => {
    client = new FakeClusterClient();
    fetchMock = vi.fn<typeof fetch>();
    service = new MonitoringService({
      config: new DashboardConfigStore(() => client, NAMESPACE),
      client: () => client,
      namespace: NAMESPACE,
      fetch: fetchMock,
      randomName: () => 'abc',
    });
  });

  it('stores the token in a labelled secret and lists it back', async () => {
    expect(await service.addGrafana(GRAFANA)).toEqual({
      ok: true,
      value: { message: 'Grafana configuration added successfully' },
    });

    const secret = await client.get(Kinds.secret, 'grafana-token-abc', NAMESPACE);
    expect(secret.metadata?.labels).toEqual({
      'app.kubernetes.io/name': 'grafana',
      'grafana.karmada.io/name': 'Main-Grafana',
    });
    expect(await service.list()).toEqual({
      ok: true,
      value: {
        monitorings: [{ name: 'Main Grafana', type: 'grafana', endpoint: 'https://grafana.example', token: 'test-token' }],
      },
    });
  });

  it('rejects duplicate names and endpoints', async () => {
    await service.addGrafana(GRAFANA);

    const byName = await service.addGrafana({ ...GRAFANA, endpoint: 'https://other.example' });
    const byEndpoint = await service.addGrafana({ ...GRAFANA, name: 'Other', endpoint: 'https://grafana.example' });

    expect(byName.ok || byName.error.code).toBe('MONITORING_DUPLICATE_NAME');
    expect(byEndpoint.ok || byEndpoint.error.message).toBe(
      "monitoring source with endpoint 'https://grafana.example' already exists"
    );
  });

  it('lists sources without a readable secret without a token', async () => {
    await service.addGrafana(GRAFANA);
    await client.delete(Kinds.secret, 'grafana-token-abc', NAMESPACE);

    const result = await service.list();

    expect(result.ok && result.value.monitorings[0]).toEqual({
      name: 'Main Grafana',
      type: 'grafana',
      endpoint: 'https://grafana.example',
    });
  });

  describe('dashboards', () => {
    beforeEach(async () => {
      await service.addGrafana(GRAFANA);
    });

    it('searches Grafana with the stored token', async () => {
      const dashboard = { id: 1, uid: 'u1', title: 'Nodes', url: '/d/u1/nodes', type: 'dash-db' };
      fetchMock.mockResolvedValue(new Response(JSON.stringify([dashboard]), { status: 200 }));

      expect(await service.dashboards('Main Grafana')).toEqual({ ok: true, value: { dashboards: [dashboard] } });
      expect(fetchMock).toHaveBeenCalledWith('https://grafana.example/api/search?query=&type=dash-db', {
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('reports Grafana failures', async () => {
      fetchMock.mockResolvedValue(new Response('nope', { status: 500, statusText: 'Internal Server Error' }));

      const result = await service.dashboards('Main Grafana');

      expect(result.ok || result.error.message).toBe('grafana request failed (500): Internal Server Error');
    });

    it('fails for unknown sources', async () => {
      const result = await service.dashboards('Other');
      expect(result.ok || result.error.code).toBe('MONITORING_SOURCE_NOT_FOUND');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  it('deletes the entry and its secrets', async () => {
    await service.addGrafana(GRAFANA);

    expect(await service.deleteSource('Main Grafana', 'https://grafana.example/')).toEqual({
      ok: true,
      value: { message: 'Monitoring configuration deleted successfully' },
    });
    expect(await client.list(Kinds.secret)).toEqual([]);
    expect(await service.list()).toEqual({ ok: true, value: { monitorings: [] } });
  });

  it('fails to delete unknown sources', async () => {
    const result = await service.deleteSource('Main Grafana', 'https://grafana.example');
    expect(result.ok || result.error.status).toBe(404);
  });
});
