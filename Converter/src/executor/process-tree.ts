/**
 * Force-kill a spawned process together with every descendant.
 *
 * POSIX: the child is spawned as a process group leader (`detached: true`),
 * so signalling the negative pid reaches the whole group. Descendants that
 * left the group (setsid, `detached: true`) are found by parent pid first and
 * killed one by one.
 * Windows: `taskkill /T` walks the tree from the root pid.
 */

import { execFile, spawn, type ChildProcess } from 'node:child_process';
import { readFile, readdir } from 'node:fs/promises';
import { Logger } from '@pdfa/shared/Utils/logger.js';

const TASKKILL_TIMEOUT_MS = 5_000;

/** True once the child has exited or been terminated by a signal */
export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/** A child that failed to spawn has no pid and nothing to kill */
export function isRunning(child: ChildProcess): boolean {
  return child.pid !== undefined && !hasExited(child);
}

/**
 * Whether a pid still names a live, non-zombie process.
 * Zombies answer signal 0, so on Linux the state letter in /proc is checked too.
 */
export async function isProcessAlive(pid: number): Promise<boolean> {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  if (process.platform !== 'linux') return true;

  try {
    const stat = await readFile(`/proc/${pid}/stat`, 'utf-8');
    // Format: pid (comm) state ...; comm may itself contain spaces or parens
    const state = stat.slice(stat.lastIndexOf(')') + 2).charAt(0);
    return state !== 'Z' && state !== 'X';
  } catch {
    return false;
  }
}

/** Parent pid from /proc/<pid>/stat: `pid (comm) state ppid ...` */
function parentFromStat(stat: string): number | undefined {
  const fields = stat.slice(stat.lastIndexOf(')') + 2).split(' ');
  const ppid = Number.parseInt(fields[1] ?? '', 10);
  return Number.isInteger(ppid) ? ppid : undefined;
}

async function linuxProcessTable(): Promise<Array<[number, number]>> {
  const entries = await readdir('/proc');
  const rows = await Promise.all(
    entries
      .filter((entry) => /^\d+$/.test(entry))
      .map(async (entry): Promise<[number, number] | undefined> => {
        try {
          const ppid = parentFromStat(await readFile(`/proc/${entry}/stat`, 'utf-8'));
          return ppid === undefined ? undefined : [Number(entry), ppid];
        } catch {
          // Exited between readdir and read
          return undefined;
        }
      }),
  );
  return rows.filter((row): row is [number, number] => row !== undefined);
}

function psProcessTable(): Promise<Array<[number, number]>> {
  return new Promise((resolve, reject) => {
    execFile('ps', ['-A', '-o', 'pid=,ppid='], { timeout: TASKKILL_TIMEOUT_MS }, (err, stdout) => {
      if (err) {
        reject(err);
        return;
      }
      const rows: Array<[number, number]> = [];
      for (const line of stdout.split('\n')) {
        const [pid, ppid] = line.trim().split(/\s+/).map(Number);
        if (Number.isInteger(pid) && Number.isInteger(ppid)) rows.push([pid, ppid]);
      }
      resolve(rows);
    });
  });
}

/**
 * Every live descendant of `rootPid`, parents before children. Best effort:
 * an unreadable process table yields an empty list.
 */
export async function listDescendants(rootPid: number, logger: Logger): Promise<number[]> {
  let table: Array<[number, number]>;
  try {
    table = process.platform === 'linux' ? await linuxProcessTable() : await psProcessTable();
  } catch (err) {
    logger.debug('Could not read the process table', { rootPid, error: err });
    return [];
  }

  const childrenOf = new Map<number, number[]>();
  for (const [pid, ppid] of table) {
    const siblings = childrenOf.get(ppid);
    if (siblings) siblings.push(pid);
    else childrenOf.set(ppid, [pid]);
  }

  const found: number[] = [];
  const queue = [rootPid];
  for (let parent = queue.shift(); parent !== undefined; parent = queue.shift()) {
    for (const pid of childrenOf.get(parent) ?? []) {
      if (found.includes(pid)) continue;
      found.push(pid);
      queue.push(pid);
    }
  }
  return found;
}

function killPid(pid: number, logger: Logger): void {
  try {
    process.kill(pid, 'SIGKILL');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ESRCH') {
      logger.warn('Descendant kill failed', { pid, error: err });
    }
  }
}

function taskkill(pid: number, logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const killer = spawn('taskkill', ['/pid', String(pid), '/T', '/F'], {
      stdio: 'ignore',
      windowsHide: true,
    });
    const timer = setTimeout(() => {
      killer.kill();
      resolve();
    }, TASKKILL_TIMEOUT_MS);
    killer.on('error', (err) => {
      clearTimeout(timer);
      logger.warn('taskkill could not be started', { pid, error: err });
      resolve();
    });
    killer.on('exit', () => {
      clearTimeout(timer);
      resolve();
    });
  });
}

/**
 * Kill the process tree rooted at `child`. Never throws: a tree that is already
 * gone is the desired end state.
 */
export async function killProcessTree(
  child: ChildProcess,
  logger: Logger = new Logger('pdfa:process-tree'),
): Promise<void> {
  const pid = child.pid;
  if (pid === undefined) return;

  if (process.platform === 'win32') {
    await taskkill(pid, logger);
    if (!hasExited(child)) child.kill('SIGKILL');
    return;
  }

  // Walked while the tree is intact: once the leader dies its children are reparented
  const descendants = await listDescendants(pid, logger);

  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group is already gone. Anything else: fall back to the leader alone.
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ESRCH') {
      logger.warn('Process group kill failed, killing leader only', { pid, error: err });
    }
    if (!hasExited(child)) child.kill('SIGKILL');
  }
  for (const descendant of descendants) killPid(descendant, logger);
}
