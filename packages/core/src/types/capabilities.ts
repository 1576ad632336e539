/**
 * Capability Interfaces
 *
 * Narrow seams between the run coordinator and its collaborators.
 */

import type { CanonicalHostname, CapturedConfig, DeviceTarget } from './device.js';
import type { CommitId, SnapshotFile } from './snapshot.js';
import type { AggregateReport } from './report.js';

export interface CaptureOptions {
  /** Upper bound for the command to complete, in milliseconds. Mandatory. */
  timeoutMs: number;
}

/**
 * Runs one non-interactive command on a device and returns its full output.
 * Implementations must close the underlying connection on every exit path.
 */
export interface DeviceSession {
  capture(target: DeviceTarget, command: string, options: CaptureOptions): Promise<CapturedConfig>;
}

/**
 * Append-only history of written snapshots.
 */
export interface HistoryRecorder {
  record(hostname: CanonicalHostname, snapshot: SnapshotFile): Promise<CommitId>;
}

export interface NotifyAck {
  /** Transport-specific ids of the delivered messages */
  messageIds: string[];
}

export interface Notifier {
  send(report: AggregateReport): Promise<NotifyAck>;
}
