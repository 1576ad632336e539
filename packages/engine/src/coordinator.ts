/**
 * Run Coordinator
 *
 * Drives capture → hostname → write → record → rotate for every device.
 * Each device pipeline is isolated: whatever it throws becomes that device's
 * failed result and the remaining devices still run.
 */

import pLimit from 'p-limit';
import {
  resolveHostname,
  toFailureInfo,
  type AggregateReport,
  type CanonicalHostname,
  type CommitId,
  type DeviceRunStatus,
  type DeviceSession,
  type DeviceTarget,
  type HistoryRecorder,
  type RunResult,
  type SnapshotFile,
} from '@netsnap/core';
import { buildReport } from './report.js';
import { RunLock, type RunLockOptions } from './run-lock.js';
import type { SnapshotStore } from './snapshot-store.js';

export interface RunHooks {
  onDeviceStarted?: (target: DeviceTarget) => void;
  onDeviceFinished?: (result: RunResult) => void;
}

export interface RunCoordinatorOptions {
  session: DeviceSession;
  store: SnapshotStore;
  /** Omit to keep snapshots on disk only */
  history?: HistoryRecorder;
  command: string;
  commandTimeoutMs: number;
  maxBackups: number;
  /** Device pipelines in flight at once (default 1: sequential) */
  concurrency?: number;
  lock?: RunLockOptions;
  hooks?: RunHooks;
  now?: () => Date;
}

function describe(error: unknown): string {
  const info = toFailureInfo(error);
  return `${info.name}: ${info.message}`;
}

export class RunCoordinator {
  private options: RunCoordinatorOptions;
  private now: () => Date;
  private activeLock?: RunLock;

  constructor(options: RunCoordinatorOptions) {
    if (options.concurrency !== undefined && options.concurrency < 1) {
      throw new RangeError(`concurrency must be at least 1, got ${options.concurrency}`);
    }
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Attempt every target and report on all of them.
   *
   * Fails before any device is attempted only when the store is locked by
   * another run (RunInProgressError).
   */
  async run(targets: readonly DeviceTarget[]): Promise<AggregateReport> {
    const lock = await RunLock.acquire(this.options.store.rootDir, this.options.lock);
    this.activeLock = lock;

    try {
      const startedAt = this.now();
      console.log(`[Netsnap:Run] Starting backup job for ${targets.length} device(s)`);

      const limit = pLimit(this.options.concurrency ?? 1);
      const results = await Promise.all(targets.map(target => limit(() => this.runDevice(target))));

      const report = buildReport(results, startedAt, this.now());
      console.log(
        `[Netsnap:Run] Backup job completed: ${report.succeeded}/${report.total} succeeded, ${report.failed} failed`,
      );
      return report;
    } finally {
      this.activeLock = undefined;
      await lock.release();
    }
  }

  /**
   * Release the store lock of an in-flight run (process shutdown).
   */
  async shutdown(): Promise<void> {
    const lock = this.activeLock;
    this.activeLock = undefined;
    await lock?.release();
  }

  private async runDevice(target: DeviceTarget): Promise<RunResult> {
    this.callHook('onDeviceStarted', () => this.options.hooks?.onDeviceStarted?.(target));
    console.log(`[Netsnap:Run] Starting backup for ${target.address}`);

    const started = performance.now();
    let hostname: CanonicalHostname | undefined;
    let result: RunResult;

    try {
      const captured = await this.options.session.capture(target, this.options.command, {
        timeoutMs: this.options.commandTimeoutMs,
      });
      hostname = resolveHostname(captured.text, target.address);
      console.log(`[Netsnap:Run] ${target.address} identified as ${hostname}`);

      const snapshot = await this.options.store.write(hostname, captured.text, captured.capturedAt);

      // The snapshot is durable from here on; later stages only add warnings
      const warnings: string[] = [];
      if (captured.stderr !== undefined) {
        warnings.push(`Device wrote to stderr: ${captured.stderr.trim()}`);
      }

      const { status, commitId } = await this.recordHistory(hostname, snapshot, warnings);
      await this.rotate(hostname, snapshot, warnings);

      result = {
        address: target.address,
        hostname,
        status,
        snapshot,
        ...(commitId !== undefined ? { commitId } : {}),
        sizeBytes: snapshot.sizeBytes,
        durationMs: performance.now() - started,
        timestamp: captured.capturedAt,
        warnings,
      };
    } catch (error) {
      console.error(`[Netsnap:Run] Backup failed for ${target.address}: ${describe(error)}`);
      result = {
        address: target.address,
        ...(hostname !== undefined ? { hostname } : {}),
        status: 'failed',
        failure: toFailureInfo(error),
        sizeBytes: 0,
        durationMs: performance.now() - started,
        timestamp: this.now(),
        warnings: [],
      };
    }

    Object.freeze(result.warnings);
    Object.freeze(result);
    const finished = result;
    this.callHook('onDeviceFinished', () => this.options.hooks?.onDeviceFinished?.(finished));
    return result;
  }

  private async recordHistory(
    hostname: CanonicalHostname,
    snapshot: SnapshotFile,
    warnings: string[],
  ): Promise<{ status: DeviceRunStatus; commitId?: CommitId }> {
    const { history } = this.options;
    if (!history) return { status: 'succeeded' };

    try {
      return { status: 'succeeded', commitId: await history.record(hostname, snapshot) };
    } catch (error) {
      const message = describe(error);
      console.warn(`[Netsnap:Run] ${hostname}: snapshot kept but not recorded in history: ${message}`);
      warnings.push(message);
      return { status: 'partially_succeeded' };
    }
  }

  private async rotate(hostname: CanonicalHostname, snapshot: SnapshotFile, warnings: string[]): Promise<void> {
    try {
      await this.options.store.rotate(hostname, this.options.maxBackups, snapshot.fileName);
    } catch (error) {
      const message = describe(error);
      console.warn(`[Netsnap:Run] Cleanup failed for ${hostname}: ${message}`);
      warnings.push(`Cleanup failed: ${message}`);
    }
  }

  private callHook(name: keyof RunHooks, call: () => void): void {
    try {
      call();
    } catch (error) {
      console.warn(`[Netsnap:Run] ${name} hook threw: ${describe(error)}`);
    }
  }
}
