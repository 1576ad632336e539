/**
 * Run Lock Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunInProgressError } from '@netsnap/core';
import { RunLock, LOCK_FILE_NAME, isProcessAlive } from '../src/run-lock.js';
import { makeTempDir } from './fakes.js';

describe('RunLock', () => {
  let rootDir: string;
  let lockPath: string;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    lockPath = join(rootDir, LOCK_FILE_NAME);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(rootDir, { recursive: true, force: true });
  });

  it('should record the owner pid and remove the file on release', async () => {
    const lock = await RunLock.acquire(rootDir, { now: () => new Date('2024-03-04T05:06:07.000Z') });

    expect(JSON.parse(await readFile(lockPath, 'utf8'))).toEqual({
      pid: process.pid,
      startedAt: '2024-03-04T05:06:07.000Z',
    });

    await lock.release();
    await expect(access(lockPath)).rejects.toThrow();
  });

  it('should create the store root if needed', async () => {
    const nested = join(rootDir, 'a', 'b');

    const lock = await RunLock.acquire(nested);

    await expect(access(join(nested, LOCK_FILE_NAME))).resolves.toBeUndefined();
    await lock.release();
  });

  it('should fail fast while another live run holds the lock', async () => {
    const lock = await RunLock.acquire(rootDir);

    const error = await RunLock.acquire(rootDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunInProgressError);
    expect(error).toMatchObject({ lockPath, ownerPid: process.pid });
    await lock.release();
  });

  it('should take over a lock left by a dead process', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: 999999, startedAt: '2024-01-01T00:00:00.000Z' }));

    const lock = await RunLock.acquire(rootDir, { isAlive: () => false });

    expect(JSON.parse(await readFile(lockPath, 'utf8'))).toMatchObject({ pid: process.pid });
    expect(console.warn).toHaveBeenCalledWith(
      '[Netsnap:Run] Removing stale lock left by pid 999999 (started 2024-01-01T00:00:00.000Z)',
    );
    await lock.release();
  });

  it('should treat an unreadable lock as held', async () => {
    await writeFile(lockPath, 'garbage');

    const error = await RunLock.acquire(rootDir, { isAlive: () => false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunInProgressError);
    expect(error).toMatchObject({ ownerPid: undefined });
    expect(await readFile(lockPath, 'utf8')).toBe('garbage');
  });

  it('should tolerate repeated release', async () => {
    const lock = await RunLock.acquire(rootDir);
    await lock.release();
    await lock.release();

    const again = await RunLock.acquire(rootDir);
    await again.release();
  });
});

describe('isProcessAlive', () => {
  it('should report the current process as alive', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
