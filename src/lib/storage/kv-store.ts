/** Minimal key-value contract the dashboard needs from etcd. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  /** Returns true when a key was removed. */
  delete(key: string): Promise<boolean>;
  /** All entries whose key starts with `prefix`, keyed by full key. */
  getPrefix(prefix: string): Promise<Record<string, string>>;
  ping(): Promise<void>;
  close(): void;
}
