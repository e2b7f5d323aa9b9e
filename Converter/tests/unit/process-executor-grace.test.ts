/**
 * A tree that survives the kill: the executor waits out the grace period
 * once and returns, instead of killing and waiting again at cleanup.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { ProcessExecutor } from '../../src/executor/process-executor.js';
import { killProcessTree } from '../../src/executor/process-tree.js';

vi.mock('../../src/executor/process-tree.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/executor/process-tree.js')>();
  return { ...actual, killProcessTree: vi.fn(async () => {}) };
});

describe('ProcessExecutor with an unkillable tree', () => {
  const survivors: number[] = [];

  afterEach(() => {
    for (const pid of survivors.splice(0)) {
      if (Number.isInteger(pid)) process.kill(-pid, 'SIGKILL');
    }
  });

  it.skipIf(process.platform === 'win32')('should wait out the kill grace period only once', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const executor = new ProcessExecutor({
      killGraceMs: 3_000,
      outputFlushMs: 200,
      logger: new Logger('test:executor'),
    });

    const result = await executor.run({
      executablePath: process.execPath,
      arguments: '-e "console.log(process.pid); setTimeout(() => {}, 60000)"',
      timeoutSeconds: 1,
    });
    survivors.push(Number.parseInt(result.standardOutput.trim(), 10));

    expect(result.timedOut).toBe(true);
    // timeout + one grace period + the flush window
    expect(result.executionTimeMs).toBeGreaterThanOrEqual(3_900);
    expect(result.executionTimeMs).toBeLessThan(6_000);
    // once on timeout, once for the pipes still open afterwards
    expect(vi.mocked(killProcessTree)).toHaveBeenCalledTimes(2);
  });
});
