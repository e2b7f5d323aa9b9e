/**
 * Bounded external process executor.
 *
 * Spawns one process without a shell and:
 * - reads stdout/stderr line by line while the process runs (no full-pipe deadlock)
 * - races exit against the timeout and the caller's AbortSignal
 * - kills the whole process tree on timeout, cancellation or monitoring error
 * - joins both readers before the result is built
 *
 * The process is exited or killed before `run` settles, on every path.
 */

import { spawn, type ChildProcess, type ChildProcessByStdio } from 'node:child_process';
import { constants } from 'node:os';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { ProcessExecutionError } from '@pdfa/shared/Types/errors.js';
import { splitArguments } from './arguments.js';
import { hasExited, isRunning, killProcessTree } from './process-tree.js';
import {
  TIMEOUT_EXIT_CODE,
  type ExecutionRequest,
  type ExecutionResult,
  type ProcessRunner,
} from './types.js';

const DEFAULT_KILL_GRACE_MS = 5_000;
const DEFAULT_OUTPUT_FLUSH_MS = 2_000;

export interface ProcessExecutorOptions {
  /** How long to wait for a killed tree to exit before returning anyway */
  killGraceMs?: number;
  /** How long to wait for the output readers to drain after exit */
  outputFlushMs?: number;
  /** Environment for the child; defaults to the service's own */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

type Settlement =
  | { type: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { type: 'timeout' }
  | { type: 'cancel' }
  | { type: 'error'; error: Error };

/** Collects one stream's lines; `closed` resolves when the reader stops */
interface LineCollector {
  lines: string[];
  closed: Promise<void>;
  close(): void;
}

function collectLines(stream: Readable, log: Logger, name: string): LineCollector {
  const lines: string[] = [];
  let open = true;
  stream.on('error', (err) => log.debug(`${name} stream error`, { error: err }));
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  reader.on('line', (line) => lines.push(`${line}\n`));
  const closed = new Promise<void>((resolve) =>
    reader.once('close', () => {
      open = false;
      resolve();
    }),
  );
  return {
    lines,
    closed,
    close: () => {
      if (open) reader.close();
    },
  };
}

function waitForExit(child: ChildProcess, ms: number): Promise<boolean> {
  if (hasExited(child)) return Promise.resolve(true);
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, ms);
    function onExit(): void {
      clearTimeout(timer);
      resolve(true);
    }
    child.once('exit', onExit);
  });
}

/** Real exit code, or 128 + signal number for a signal-terminated process */
function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + constants.signals[signal];
  return TIMEOUT_EXIT_CODE;
}

export class ProcessExecutor implements ProcessRunner {
  private readonly killGraceMs: number;
  private readonly outputFlushMs: number;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly log: Logger;

  constructor(options: ProcessExecutorOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.outputFlushMs = options.outputFlushMs ?? DEFAULT_OUTPUT_FLUSH_MS;
    this.env = options.env;
    this.log = options.logger ?? new Logger('pdfa:executor');
  }

  async run(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    const { executablePath, timeoutSeconds } = request;
    if (!Number.isInteger(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new ProcessExecutionError(`Timeout must be a positive integer, got ${timeoutSeconds}`);
    }

    const startTime = Date.now();
    if (signal?.aborted) {
      this.log.warn('Execution cancelled before start', { executablePath });
      return {
        exitCode: TIMEOUT_EXIT_CODE,
        standardOutput: '',
        standardError: '',
        timedOut: false,
        cancelled: true,
        executionTimeMs: 0,
      };
    }

    this.log.info(`Starting process: ${executablePath} ${request.arguments}`);
    const child = this.spawnChild(request);
    // A kill that already waited out the grace period is not repeated at cleanup
    let terminated = false;
    const terminate = async (): Promise<void> => {
      terminated = true;
      await this.terminate(child);
    };

    try {
      const stdout = collectLines(child.stdout, this.log, 'stdout');
      const stderr = collectLines(child.stderr, this.log, 'stderr');
      const output = (): Pick<ExecutionResult, 'standardOutput' | 'standardError'> => ({
        standardOutput: stdout.lines.join(''),
        standardError: stderr.lines.join(''),
      });
      const readers = [stdout, stderr];

      const settlement = await this.awaitSettlement(child, timeoutSeconds, signal);

      switch (settlement.type) {
        case 'exit': {
          await this.joinReaders(child, readers);
          const exitCode = toExitCode(settlement.code, settlement.signal);
          const executionTimeMs = Date.now() - startTime;
          this.log.info(`Process completed with exit code ${exitCode} in ${executionTimeMs}ms`);
          return { exitCode, ...output(), timedOut: false, cancelled: false, executionTimeMs };
        }

        case 'timeout':
        case 'cancel': {
          const timedOut = settlement.type === 'timeout';
          if (timedOut) {
            this.log.warn(`Process exceeded timeout of ${timeoutSeconds} seconds: ${executablePath}`);
          } else {
            this.log.warn(`Process cancelled by caller: ${executablePath}`);
          }
          await terminate();
          await this.joinReaders(child, readers);
          return {
            exitCode: TIMEOUT_EXIT_CODE,
            ...output(),
            timedOut,
            cancelled: !timedOut,
            executionTimeMs: Date.now() - startTime,
          };
        }

        case 'error': {
          this.log.error(`Error executing process: ${executablePath}`, settlement.error);
          await terminate();
          throw new ProcessExecutionError(`Process execution failed: ${settlement.error.message}`, {
            executablePath,
            cause: settlement.error,
          });
        }

        default: {
          const unhandled: never = settlement;
          throw new ProcessExecutionError(`Unknown process settlement: ${JSON.stringify(unhandled)}`);
        }
      }
    } finally {
      if (!terminated && isRunning(child)) {
        this.log.warn('Process still running at cleanup, killing', { pid: child.pid });
        await this.terminate(child);
      }
    }
  }

  private spawnChild(request: ExecutionRequest): ChildProcessByStdio<null, Readable, Readable> {
    const isWindows = process.platform === 'win32';
    try {
      return spawn(
        request.executablePath,
        isWindows ? [request.arguments] : splitArguments(request.arguments),
        {
          stdio: ['ignore', 'pipe', 'pipe'],
          env: this.env,
          windowsHide: true,
          // POSIX: own process group so the whole tree can be signalled
          detached: !isWindows,
          // Windows: the string reaches the tool's parser untouched
          windowsVerbatimArguments: isWindows,
          argv0: isWindows ? `"${request.executablePath}"` : undefined,
        },
      );
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error(`Error starting process: ${request.executablePath}`, error);
      throw new ProcessExecutionError(`Process execution failed: ${error.message}`, {
        executablePath: request.executablePath,
        cause: error,
      });
    }
  }

  /**
   * Resolves with whichever comes first: exit, spawn/monitor error, the
   * timeout timer or the caller's abort. Listeners are removed afterwards.
   */
  private awaitSettlement(
    child: ChildProcess,
    timeoutSeconds: number,
    signal: AbortSignal | undefined,
  ): Promise<Settlement> {
    return new Promise<Settlement>((resolve) => {
      let settled = false;
      let timeoutTimer: ReturnType<typeof setTimeout> | undefined;

      const finish = (settlement: Settlement): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        signal?.removeEventListener('abort', onAbort);
        child.off('exit', onExit);
        resolve(settlement);
      };

      const onExit = (code: number | null, exitSignal: NodeJS.Signals | null): void =>
        finish({ type: 'exit', code, signal: exitSignal });
      const onAbort = (): void => finish({ type: 'cancel' });

      // Stays attached for the child's lifetime: an unhandled 'error' event would crash the service
      child.on('error', (error) => {
        if (settled) {
          this.log.warn('Process error after settlement', { pid: child.pid, error });
          return;
        }
        finish({ type: 'error', error });
      });
      child.once('exit', onExit);

      timeoutTimer = setTimeout(() => finish({ type: 'timeout' }), timeoutSeconds * 1000);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Kill the tree and give it the grace period to go away; never throws */
  private async terminate(child: ChildProcess): Promise<void> {
    if (!isRunning(child)) return;
    await killProcessTree(child, this.log);
    const exited = await waitForExit(child, this.killGraceMs);
    if (!exited) {
      this.log.warn(`Process ${child.pid} did not exit within ${this.killGraceMs}ms of kill`);
    }
  }

  /**
   * Wait for both readers to see end-of-stream. A helper that inherited the
   * pipes can keep them open after the main process exits; past the flush
   * window the leftover tree is killed and the pipes destroyed.
   */
  private async joinReaders(child: ChildProcess, readers: LineCollector[]): Promise<void> {
    const readersClosed = Promise.all(readers.map((reader) => reader.closed));
    let flushTimer: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      readersClosed.then(() => true),
      new Promise<boolean>((resolve) => {
        flushTimer = setTimeout(() => resolve(false), this.outputFlushMs);
      }),
    ]);
    clearTimeout(flushTimer);

    if (!drained) {
      this.log.warn('Output pipes still open after exit, killing leftover helpers', { pid: child.pid });
      await killProcessTree(child, this.log);
      for (const reader of readers) reader.close();
      child.stdout?.destroy();
      child.stderr?.destroy();
      await readersClosed;
    }
  }
}
