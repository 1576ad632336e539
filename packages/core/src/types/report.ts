/**
 * Run Result and Aggregate Report Types
 */

import type { CanonicalHostname } from './device.js';
import type { CommitId, SnapshotFile } from './snapshot.js';

/**
 * Terminal state of one device within a run.
 *
 * `partially_succeeded` means the snapshot is on disk but history recording failed.
 */
export type DeviceRunStatus = 'succeeded' | 'partially_succeeded' | 'failed';

export interface FailureInfo {
  name: string;
  code: string;
  message: string;
}

export interface RunResult {
  readonly address: string;
  readonly hostname?: CanonicalHostname;
  readonly status: DeviceRunStatus;
  readonly failure?: FailureInfo;
  readonly snapshot?: SnapshotFile;
  readonly commitId?: CommitId;
  readonly sizeBytes: number;
  readonly durationMs: number;
  readonly timestamp: Date;
  readonly warnings: readonly string[];
}

export interface AggregateReport {
  total: number;
  /** Devices with a durable snapshot, including partially succeeded ones */
  succeeded: number;
  partiallySucceeded: number;
  failed: number;
  /** In device iteration order */
  results: readonly RunResult[];
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}
