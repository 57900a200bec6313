import { Etcd3 } from 'etcd3';
import type { KeyValueStore } from './kv-store.js';

export class EtcdKeyValueStore implements KeyValueStore {
  private client: Etcd3;

  constructor(endpoint: string, dialTimeoutMs = 5000) {
    this.client = new Etcd3({ hosts: endpoint, dialTimeout: dialTimeoutMs });
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key).string();
  }

  async put(key: string, value: string): Promise<void> {
    await this.client.put(key).value(value);
  }

  async delete(key: string): Promise<boolean> {
    const response = await this.client.delete().key(key);
    return Number(response.deleted) > 0;
  }

  getPrefix(prefix: string): Promise<Record<string, string>> {
    return this.client.getAll().prefix(prefix).strings();
  }

  async ping(): Promise<void> {
    await this.client.maintenance.status();
  }

  close(): void {
    this.client.close();
  }
}
