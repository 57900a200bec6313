import { createLogger } from '../lib/logging/logger.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';

const log = createLogger('Shutdown');

const FORCE_EXIT_MS = 10_000;

export interface ShutdownDeps {
  server: { close(callback?: (error?: Error) => void): unknown };
  kv: Pick<KeyValueStore, 'close'> | null;
  exit: (code: number) => void;
  /** Exit anyway when the server has not closed by then. */
  forceExitMs?: number;
}

/**
 * Stop accepting connections, close the store and exit. Only the first
 * call has an effect.
 */
export function createShutdown({ server, kv, exit, forceExitMs = FORCE_EXIT_MS }: ShutdownDeps) {
  let started = false;

  return (reason: string, code = 0): void => {
    if (started) return;
    started = true;
    log.info('Shutting down', { data: { reason, code } });

    const timer = setTimeout(() => {
      log.warn('Server did not close in time, exiting', { data: { forceExitMs } });
      exit(code);
    }, forceExitMs);
    timer.unref();

    server.close((error) => {
      if (error) log.error('Server close failed', { error });
      try {
        kv?.close();
      } catch (closeError) {
        log.error('Failed to close the user store', { error: closeError });
      }
      clearTimeout(timer);
      exit(code);
    });
  };
}
