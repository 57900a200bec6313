import { describe, expect, it, vi } from 'vitest';
import { FakeClusterClient } from '../../../tests/helpers/fake-cluster.js';
import {
  PorchService,
  type PorchTransport,
  ServiceAccountTokenCache,
  TOKEN_AUDIENCE,
  TOKEN_LIFETIME_SECONDS,
} from '../porch.service.js';

const EXPIRY = new Date('2030-01-01T00:00:00Z');

describe('ServiceAccountTokenCache', () => {
  it('reuses a token until five minutes before expiry', async () => {
    const client = new FakeClusterClient();
    let now = new Date('2029-12-31T23:00:00Z');
    const cache = new ServiceAccountTokenCache(() => client, () => now);

    expect(await cache.token()).toEqual({ ok: true, value: 'sa-token-1' });
    expect(await cache.token()).toEqual({ ok: true, value: 'sa-token-1' });
    now = new Date(EXPIRY.getTime() - 4 * 60 * 1000);
    expect(await cache.token()).toEqual({ ok: true, value: 'sa-token-2' });
    expect(client.tokens[0]).toEqual({
      namespace: 'karmada-system',
      name: 'karmada-dashboard',
      audiences: [TOKEN_AUDIENCE],
      expirationSeconds: TOKEN_LIFETIME_SECONDS,
    });
  });

  it('reports token request failures', async () => {
    const client = new FakeClusterClient().failOn('createServiceAccountToken', new Error('denied'));
    const cache = new ServiceAccountTokenCache(() => client);

    expect(await cache.token()).toEqual({
      ok: false,
      error: { code: 'PORCH_TOKEN_FAILED', message: 'failed to obtain service account token: denied', status: 500 },
    });
  });
});

describe('PorchService', () => {
  const tokens = () => new ServiceAccountTokenCache(() => new FakeClusterClient());

  it('builds upstream URLs under the Porch API group', () => {
    const service = new PorchService({
      apiUrl: 'https://porch.example/',
      transport: { send: vi.fn() },
      tokens: tokens(),
    });

    const url = service.upstreamUrl('packagerevision', 'pkg/v1', '?limit=5');

    expect(url.ok && url.value.toString()).toBe(
      'https://porch.example/apis/porch.kpt.dev/v1alpha1/namespaces/default/packagerevisions/pkg%2Fv1?limit=5'
    );
  });

  it('is unavailable without an API URL', async () => {
    const service = new PorchService({ transport: { send: vi.fn() }, tokens: tokens() });

    expect(service.configured).toBe(false);
    const result = await service.proxy('repository', undefined, { method: 'GET', headers: new Headers(), search: '' });
    expect(result.ok || result.error.code).toBe('PORCH_NOT_CONFIGURED');
  });

  it('forwards requests with the service account token', async () => {
    const response = { status: 200, headers: { 'content-type': 'application/json' }, body: Buffer.from('{}') };
    const send = vi.fn<PorchTransport['send']>().mockResolvedValue(response);
    const service = new PorchService({ apiUrl: 'https://porch.example', transport: { send }, tokens: tokens() });

    const result = await service.proxy('repository', undefined, {
      method: 'POST',
      headers: new Headers({ authorization: 'Bearer user-token', host: 'dashboard', accept: 'application/json' }),
      search: '',
      body: Buffer.from('{"kind":"Repository"}'),
    });

    expect(result).toEqual({ ok: true, value: response });
    const [url, request] = send.mock.calls[0] ?? [];
    expect(url?.toString()).toBe('https://porch.example/apis/porch.kpt.dev/v1alpha1/namespaces/default/repositories');
    expect(request?.method).toBe('POST');
    expect(request?.headers).toEqual({ accept: 'application/json', authorization: 'Bearer sa-token-1' });
  });

  it('maps transport failures to bad gateway', async () => {
    const send = vi.fn<PorchTransport['send']>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const service = new PorchService({ apiUrl: 'https://porch.example', transport: { send }, tokens: tokens() });

    const result = await service.proxy('repository', 'blueprints', { method: 'GET', headers: new Headers(), search: '' });

    expect(result).toEqual({
      ok: false,
      error: { code: 'PORCH_UPSTREAM_FAILED', message: 'Porch request failed: connect ECONNREFUSED', status: 502 },
    });
  });
});
