import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryKeyValueStore } from '../../../tests/helpers/memory-stores.js';
import { createShutdown } from '../shutdown.js';

const closingServer = () => ({
  close: vi.fn((callback?: (error?: Error) => void) => callback?.()),
});

describe('createShutdown', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('closes the server and the store before exiting', () => {
    const server = closingServer();
    const kv = new MemoryKeyValueStore();
    const exit = vi.fn<(code: number) => void>();

    createShutdown({ server, kv, exit })('SIGTERM');

    expect(server.close).toHaveBeenCalledTimes(1);
    expect(kv.closed).toBe(true);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits with the given code and ignores later calls', () => {
    const server = closingServer();
    const exit = vi.fn<(code: number) => void>();
    const shutdown = createShutdown({ server, kv: null, exit });

    shutdown('unhandledRejection', 1);
    shutdown('SIGINT');

    expect(server.close).toHaveBeenCalledTimes(1);
    expect(exit.mock.calls).toEqual([[1]]);
  });

  it('exits when the server does not close in time', () => {
    vi.useFakeTimers();
    const server = { close: vi.fn() };
    const exit = vi.fn<(code: number) => void>();

    createShutdown({ server, kv: null, exit, forceExitMs: 500 })('unhandledRejection', 1);
    expect(exit).not.toHaveBeenCalled();

    vi.advanceTimersByTime(500);

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('still exits when the store fails to close', () => {
    const kv = new MemoryKeyValueStore();
    kv.close = () => {
      throw new Error('already closed');
    };
    const exit = vi.fn<(code: number) => void>();

    createShutdown({ server: closingServer(), kv, exit })('SIGTERM');

    expect(exit).toHaveBeenCalledWith(0);
  });
});
