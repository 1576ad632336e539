/**
 * Run Lock
 *
 * Advisory lock file in the store root: at most one run per store at a time.
 */

import { mkdir, open, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { RunInProgressError, StorageError } from '@netsnap/core';

export const LOCK_FILE_NAME = '.netsnap.lock';

export interface LockOwner {
  pid: number;
  startedAt: string;
}

export interface RunLockOptions {
  /** Liveness probe for the pid recorded in an existing lock */
  isAlive?: (pid: number) => boolean;
  now?: () => Date;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function parseOwner(content: string): LockOwner | undefined {
  try {
    const value: unknown = JSON.parse(content);
    if (typeof value !== 'object' || value === null) return undefined;
    const pid: unknown = Reflect.get(value, 'pid');
    const startedAt: unknown = Reflect.get(value, 'startedAt');
    if (typeof pid !== 'number' || !Number.isInteger(pid) || pid <= 0) return undefined;
    return { pid, startedAt: typeof startedAt === 'string' ? startedAt : '' };
  } catch {
    return undefined;
  }
}

export class RunLock {
  private released = false;

  private constructor(readonly path: string) {}

  static async acquire(rootDir: string, options: RunLockOptions = {}): Promise<RunLock> {
    const isAlive = options.isAlive ?? isProcessAlive;
    const now = options.now ?? (() => new Date());
    const lockPath = join(rootDir, LOCK_FILE_NAME);

    try {
      await mkdir(rootDir, { recursive: true });
    } catch (error) {
      throw new StorageError(error instanceof Error ? error.message : String(error));
    }

    for (let attempt = 0; attempt < 2; attempt++) {
      if (await RunLock.tryCreate(lockPath, { pid: process.pid, startedAt: now().toISOString() })) {
        return new RunLock(lockPath);
      }

      const owner = await readFile(lockPath, 'utf8').then(parseOwner, () => undefined);
      if (owner === undefined || isAlive(owner.pid)) {
        throw new RunInProgressError(lockPath, owner?.pid);
      }

      console.warn(`[Netsnap:Run] Removing stale lock left by pid ${owner.pid} (started ${owner.startedAt})`);
      await rm(lockPath, { force: true });
    }

    throw new RunInProgressError(lockPath);
  }

  private static async tryCreate(lockPath: string, owner: LockOwner): Promise<boolean> {
    const handle = await open(lockPath, 'wx').catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return undefined;
      throw new StorageError(error instanceof Error ? error.message : String(error));
    });
    if (handle === undefined) return false;

    try {
      await handle.writeFile(JSON.stringify(owner));
    } finally {
      await handle.close();
    }
    return true;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.path, { force: true });
  }
}
