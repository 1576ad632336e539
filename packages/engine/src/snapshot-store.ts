/**
 * Snapshot Store - manages per-device snapshot files on disk
 *
 * Layout: `<rootDir>/<hostname>/<hostname>_<YYYYMMDD>_<HHMMSS>.conf`
 */

import { randomBytes } from 'node:crypto';
import { link, mkdir, open, readdir, rm } from 'node:fs/promises';
import { join, posix } from 'node:path';
import {
  ConflictError,
  StorageError,
  formatTimestamp,
  isTimestamp,
  type CanonicalHostname,
  type SnapshotFile,
} from '@netsnap/core';

export const SNAPSHOT_EXTENSION = '.conf';

export interface SnapshotStoreConfig {
  rootDir: string;
}

export function snapshotFileName(hostname: CanonicalHostname, timestamp: Date): string {
  return `${hostname}_${formatTimestamp(timestamp)}${SNAPSHOT_EXTENSION}`;
}

/**
 * Returns the embedded timestamp when `fileName` is a snapshot of `hostname`.
 */
export function parseSnapshotFileName(hostname: CanonicalHostname, fileName: string): string | undefined {
  const prefix = `${hostname}_`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(SNAPSHOT_EXTENSION)) {
    return undefined;
  }
  const stamp = fileName.slice(prefix.length, fileName.length - SNAPSHOT_EXTENSION.length);
  return isTimestamp(stamp) ? stamp : undefined;
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SnapshotStore {
  readonly rootDir: string;

  constructor(config: SnapshotStoreConfig) {
    this.rootDir = config.rootDir;
  }

  namespaceDir(hostname: CanonicalHostname): string {
    return join(this.rootDir, hostname);
  }

  /**
   * Persist `text` verbatim as a new snapshot.
   *
   * The content is written and synced to a hidden temp file, then published
   * under its final name with a hard link, so the snapshot is either complete
   * or absent. An existing snapshot with the same name is never overwritten.
   */
  async write(hostname: CanonicalHostname, text: string, timestamp: Date): Promise<SnapshotFile> {
    const dir = this.namespaceDir(hostname);
    const fileName = snapshotFileName(hostname, timestamp);
    const finalPath = join(dir, fileName);
    const tempPath = join(dir, `.${fileName}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

    try {
      await mkdir(dir, { recursive: true });
      const handle = await open(tempPath, 'wx');
      try {
        await handle.writeFile(text, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new StorageError(describe(error), hostname);
    }

    try {
      await link(tempPath, finalPath);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new ConflictError(finalPath, hostname);
      }
      throw new StorageError(describe(error), hostname);
    } finally {
      await this.removeTemp(tempPath);
    }

    console.log(`[Netsnap:Store] Backup saved to ${finalPath}`);
    return {
      hostname,
      fileName,
      path: finalPath,
      relativePath: posix.join(hostname, fileName),
      sizeBytes: Buffer.byteLength(text, 'utf8'),
      capturedAt: timestamp,
    };
  }

  private async removeTemp(tempPath: string): Promise<void> {
    await rm(tempPath, { force: true }).catch((error: unknown) => {
      console.warn(`[Netsnap:Store] Could not remove temp file ${tempPath}: ${describe(error)}`);
    });
  }

  /**
   * Snapshot file names of `hostname`, oldest first.
   */
  async list(hostname: CanonicalHostname): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.namespaceDir(hostname));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw new StorageError(describe(error), hostname);
    }

    return entries
      .filter(name => parseSnapshotFileName(hostname, name) !== undefined)
      .sort();
  }

  /**
   * Delete the oldest snapshots until at most `maxBackups` remain.
   *
   * `maxBackups <= 0` keeps everything. `keepFileName` is never deleted.
   * Returns the deleted file names.
   */
  async rotate(hostname: CanonicalHostname, maxBackups: number, keepFileName?: string): Promise<string[]> {
    if (maxBackups <= 0) return [];

    const files = await this.list(hostname);
    const excess = files.length - maxBackups;
    if (excess <= 0) return [];

    const doomed = files.filter(name => name !== keepFileName).slice(0, excess);
    for (const name of doomed) {
      try {
        await rm(join(this.namespaceDir(hostname), name), { force: true });
      } catch (error) {
        throw new StorageError(describe(error), hostname);
      }
      console.log(`[Netsnap:Store] Deleted old backup: ${hostname}/${name}`);
    }
    return doomed;
  }
}
