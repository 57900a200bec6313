/**
 * Etcd connection bootstrap
 *
 * Tries each candidate endpoint a few times with linear back-off and
 * returns the first store that answers a status request.
 */

import { errorMessage } from '../errors/base.js';
import { createLogger } from '../logging/logger.js';
import type { KeyValueStore } from './kv-store.js';

const log = createLogger('EtcdBootstrap');

export interface EtcdEndpointOptions {
  host: string;
  port: number;
  endpoint?: string;
}

export interface ConnectOptions {
  attempts?: number;
  backoffMs?: number;
  connect: (endpoint: string) => KeyValueStore;
  sleep?: (ms: number) => Promise<void>;
}

/** Candidate endpoints in preference order, without duplicates. */
export function etcdEndpoints({ host, port, endpoint }: EtcdEndpointOptions): string[] {
  const candidates = [
    endpoint ?? `http://${host}:${port}`,
    `http://${host}.svc:${port}`,
    `http://${host}:${port}`,
    `http://localhost:${port}`,
  ];
  return [...new Set(candidates)];
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function connectEtcd(
  endpoints: string[],
  { attempts = 3, backoffMs = 500, connect, sleep = defaultSleep }: ConnectOptions
): Promise<{ store: KeyValueStore; endpoint: string } | null> {
  for (const endpoint of endpoints) {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const store = connect(endpoint);
      try {
        await store.ping();
        log.info('Connected to etcd', { data: { endpoint, attempt } });
        return { store, endpoint };
      } catch (error) {
        store.close();
        log.warn('Etcd endpoint not reachable', {
          data: { endpoint, attempt, reason: errorMessage(error) },
        });
        if (attempt < attempts) await sleep(attempt * backoffMs);
      }
    }
  }
  return null;
}
