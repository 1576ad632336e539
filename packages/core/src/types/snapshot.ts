/**
 * Snapshot File Types
 */

import type { CanonicalHostname } from './device.js';

export interface SnapshotFile {
  hostname: CanonicalHostname;
  /** `<hostname>_<YYYYMMDD>_<HHMMSS>.conf` */
  fileName: string;
  /** Absolute path on disk */
  path: string;
  /** Path relative to the store root, e.g. `core-sw1/core-sw1_20240102_030405.conf` */
  relativePath: string;
  sizeBytes: number;
  capturedAt: Date;
}

export type CommitId = string;
