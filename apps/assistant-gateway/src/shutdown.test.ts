import { EventEmitter } from 'node:events';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { registerShutdown } from './shutdown';
import { createTestLogger } from './testing/fixtures';

function setup(stop: () => Promise<void> = async () => undefined) {
  const source = new EventEmitter();
  const exit = vi.fn<(code: number) => void>();
  const app = { logger: createTestLogger(), stop: vi.fn(stop) };
  const shutdown = registerShutdown(app, { source, exit, timeoutMs: 5_000 });
  return { app, exit, shutdown, source };
}

describe('registerShutdown', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stops the application once and exits cleanly', async () => {
    const { app, exit, shutdown } = setup();

    await Promise.all([shutdown('SIGTERM'), shutdown('SIGINT')]);

    expect(app.stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('reacts to signals emitted on the source', async () => {
    const { app, exit, source, shutdown } = setup();

    source.emit('SIGINT');
    await shutdown('SIGINT');

    expect(app.stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits with a failure code when stopping throws', async () => {
    const { exit, shutdown } = setup(async () => {
      throw new Error('server close failed');
    });

    await shutdown('SIGTERM');

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('forces an exit when stopping outlives the timeout', () => {
    vi.useFakeTimers();
    const { exit, shutdown } = setup(() => new Promise<void>(() => undefined));

    void shutdown('SIGTERM');
    vi.advanceTimersByTime(5_000);

    expect(exit).toHaveBeenCalledWith(1);
  });
});
