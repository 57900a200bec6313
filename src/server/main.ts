#!/usr/bin/env node
/**
 * Dashboard API server entry point
 */

import { serve } from '@hono/node-server';
import { Command } from 'commander';
import { initOpenFga } from '../lib/authz/fga-relation-store.js';
import type { RelationStore } from '../lib/authz/relation-store.js';
import { type CliOptions, loadConfig } from '../lib/config/config.js';
import type { DashboardConfig } from '../lib/config/schemas.js';
import { errorMessage } from '../lib/errors/base.js';
import { loadKubeConfig } from '../lib/k8s/kubeconfig.js';
import type { ClusterConnector } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import { connectEtcd, etcdEndpoints } from '../lib/storage/etcd-bootstrap.js';
import { EtcdKeyValueStore } from '../lib/storage/etcd-store.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';
import { createRouter } from './router.js';
import { connectorFor, createRuntime } from './runtime.js';
import { createShutdown } from './shutdown.js';

const log = createLogger('Server');

const ADMIN_EMAIL = 'admin@example.com';

function createProgram(): Command {
  return new Command()
    .name('fleet-dashboard-api')
    .description('REST and WebSocket backend for a Karmada multi-cluster dashboard')
    .option('--insecure-bind-address <address>', 'address to listen on', '0.0.0.0')
    .option('--insecure-port <port>', 'port to listen on', '8000')
    .option('--karmada-kubeconfig <path>', 'kubeconfig of the Karmada API server')
    .option('--karmada-context <name>', 'context inside the Karmada kubeconfig')
    .option('--skip-karmada-apiserver-tls-verify', 'skip TLS verification of the Karmada API server', false)
    .option('--kubeconfig <path>', 'kubeconfig of the management cluster')
    .option('--context <name>', 'context inside the management kubeconfig')
    .option('--skip-kube-apiserver-tls-verify', 'skip TLS verification of the management cluster', false)
    .option('--namespace <namespace>', 'namespace the dashboard runs in', 'karmada-system')
    .option('--openfga-api-url <url>', 'OpenFGA API URL; enables authorization')
    .option('--etcd-host <host>', 'etcd host', 'ml-platform-admin-etcd')
    .option('--etcd-port <port>', 'etcd port', '2379')
    .option('--porch-api-url <url>', 'Porch API URL; enables the Porch proxy')
    .option('--skip-porch-tls-verify', 'skip TLS verification of the Porch API', false);
}

function loadConnector(config: DashboardConfig): ClusterConnector {
  const karmada = loadKubeConfig({
    kubeconfigPath: config.karmada.kubeconfig,
    context: config.karmada.context,
    skipTLSVerify: config.karmada.skipTlsVerify,
  });
  if (!karmada.ok) throw new Error(`Karmada kubeconfig: ${karmada.error.message}`);

  const management = loadKubeConfig({
    kubeconfigPath: config.management.kubeconfig,
    context: config.management.context,
    skipTLSVerify: config.management.skipTlsVerify,
  });
  if (!management.ok) throw new Error(`Management kubeconfig: ${management.error.message}`);

  return connectorFor(karmada.value, management.value);
}

async function initAuthorization(apiUrl: string | undefined): Promise<RelationStore | null> {
  if (!apiUrl) {
    log.info('OpenFGA not configured, authorization disabled');
    return null;
  }
  try {
    return await initOpenFga(apiUrl);
  } catch (error) {
    log.error('OpenFGA initialisation failed, authorization disabled', { error });
    return null;
  }
}

async function initEtcd(config: DashboardConfig): Promise<KeyValueStore | null> {
  const connected = await connectEtcd(etcdEndpoints(config.etcd), {
    connect: (endpoint) => new EtcdKeyValueStore(endpoint),
  });
  if (!connected) {
    log.error('Could not reach etcd, password login disabled');
    return null;
  }
  return connected.store;
}

async function logVersions(connector: ClusterConnector): Promise<void> {
  try {
    const [management, karmada] = await Promise.all([
      connector.management().serverVersion(),
      connector.karmada().serverVersion(),
    ]);
    log.info('Cluster versions', { data: { management, karmada } });
  } catch (error) {
    log.warn('Could not read cluster versions', { data: { reason: errorMessage(error) } });
  }
}

async function main(argv: string[]): Promise<void> {
  const cli = createProgram().parse(argv).opts<CliOptions>();

  const config = loadConfig(cli);
  if (!config.ok) {
    log.error('Invalid configuration', { data: { issues: config.error.details } });
    process.exitCode = 1;
    return;
  }

  const connector = loadConnector(config.value);
  const relations = await initAuthorization(config.value.openfga.apiUrl);
  const kv = await initEtcd(config.value);
  const runtime = createRuntime(config.value, { connector, relations, kv });

  if (runtime.users) {
    const ensured = await runtime.users.ensure('admin', config.value.auth.adminPassword, ADMIN_EMAIL, 'admin');
    if (!ensured.ok) log.error('Failed to ensure admin user', { data: { reason: ensured.error.message } });
    else if (ensured.value) log.info('Created admin user');
  }

  if (runtime.porchService.configured) {
    log.info('Porch proxy enabled', { data: { apiUrl: config.value.porch.apiUrl } });
  }

  await logVersions(connector);

  const { app, injectWebSocket } = createRouter(runtime);
  const { bindAddress, port } = config.value.server;
  const server = serve({ fetch: app.fetch, hostname: bindAddress, port }, (info) => {
    log.info(`Listening on http://${bindAddress}:${info.port}`);
  });
  injectWebSocket(server);

  const shutdown = createShutdown({ server, kv, exit: (code) => process.exit(code) });
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { error: reason });
    shutdown('unhandledRejection', 1);
  });
}

main(process.argv).catch((error: unknown) => {
  log.error('Startup failed', { error });
  process.exitCode = 1;
});
