import { describe, expect, it } from 'vitest';
import { DEFAULT_FRONTEND_URL, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const result = loadConfig({}, {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.server).toEqual({
      bindAddress: '0.0.0.0',
      port: 8000,
      corsOrigin: 'http://localhost:5173',
    });
    expect(result.value.namespace).toBe('karmada-system');
    expect(result.value.etcd).toEqual({
      host: 'ml-platform-admin-etcd',
      port: 2379,
      endpoint: undefined,
    });
    expect(result.value.auth.jwtSecret).toBe('default-karmada-dashboard-secret-key');
    expect(result.value.keycloak).toEqual({
      url: undefined,
      realm: 'ml-platform',
      clientId: 'ml-platform-admin',
      clientSecret: undefined,
      frontendUrl: DEFAULT_FRONTEND_URL,
    });
    expect(result.value.openfga.apiUrl).toBeUndefined();
    expect(result.value.porch).toEqual({ apiUrl: undefined, skipTlsVerify: false });
  });

  it('reads flags and environment overrides', () => {
    const result = loadConfig(
      {
        insecurePort: '9090',
        karmadaKubeconfig: '/etc/karmada/karmada.config',
        karmadaContext: 'karmada-apiserver',
        skipKarmadaApiserverTlsVerify: true,
        etcdPort: '12379',
        porchApiUrl: 'https://porch.local:6443',
      },
      {
        KARMADA_DASHBOARD_JWT_SECRET: 'test-secret',
        ENV_NAME: 'dev',
        KEYCLOAK_URL: 'http://keycloak.local:8080',
        FRONTEND_URL: 'http://dashboard.local',
      }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.server.port).toBe(9090);
    expect(result.value.karmada).toEqual({
      kubeconfig: '/etc/karmada/karmada.config',
      context: 'karmada-apiserver',
      skipTlsVerify: true,
    });
    expect(result.value.etcd.port).toBe(12379);
    expect(result.value.porch.apiUrl).toBe('https://porch.local:6443');
    expect(result.value.auth.jwtSecret).toBe('test-secret');
    expect(result.value.keycloak.realm).toBe('ml-platform-dev');
    expect(result.value.keycloak.url).toBe('http://keycloak.local:8080');
    expect(result.value.keycloak.frontendUrl).toBe('http://dashboard.local');
  });

  it('treats blank strings as unset', () => {
    const result = loadConfig({ openfgaApiUrl: '  ', kubeconfig: '' }, {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.openfga.apiUrl).toBeUndefined();
    expect(result.value.management.kubeconfig).toBeUndefined();
  });

  it('rejects an invalid port', () => {
    const result = loadConfig({ insecurePort: '70000' }, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('VALIDATION_ERROR');
    expect(result.error.details).toEqual({
      errors: [
        { path: 'server.port', message: 'Number must be less than or equal to 65535' },
      ],
    });
  });
});
