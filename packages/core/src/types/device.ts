/**
 * Device Types
 */

export interface DeviceCredentials {
  username: string;
  password: string;
}

/**
 * One device to back up. Immutable for the duration of a run.
 */
export interface DeviceTarget {
  readonly address: string;
  readonly port: number;
  readonly credentials: DeviceCredentials;
}

/**
 * Raw output of the configuration command for one capture attempt.
 */
export interface CapturedConfig {
  target: DeviceTarget;
  text: string;
  capturedAt: Date;
  /** Non-empty stderr emitted by a command that still exited cleanly */
  stderr?: string;
}

/**
 * Normalized, filesystem-safe device identifier used as the snapshot namespace.
 */
export type CanonicalHostname = string;
