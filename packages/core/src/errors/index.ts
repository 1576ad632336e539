/**
 * Netsnap Error Codes
 */
export const ErrorCodes = {
  CONNECT_FAILED: 'CONNECT_FAILED',
  AUTH_FAILED: 'AUTH_FAILED',
  TIMEOUT: 'TIMEOUT',
  COMMAND_FAILED: 'COMMAND_FAILED',
  STORAGE_FAILED: 'STORAGE_FAILED',
  CONFLICT: 'CONFLICT',
  HISTORY_FAILED: 'HISTORY_FAILED',
  RUN_IN_PROGRESS: 'RUN_IN_PROGRESS',
  CONFIG_INVALID: 'CONFIG_INVALID',
  NOTIFY_FAILED: 'NOTIFY_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export const UNKNOWN_ERROR_CODE = 'UNKNOWN';

/**
 * Base class for netsnap errors
 */
export class NetsnapError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    public readonly device?: string,
  ) {
    super(message);
    this.name = 'NetsnapError';
  }

  toErrorInfo() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error: TCP connect or SSH handshake failed
 */
export class ConnectError extends NetsnapError {
  constructor(reason: string, device?: string, hint?: string) {
    super(
      ErrorCodes.CONNECT_FAILED,
      `Connection failed: ${reason}`,
      hint ?? 'Check that the device is reachable and SSH is enabled',
      device,
    );
    this.name = 'ConnectError';
  }
}

/**
 * Error: Device rejected the credentials
 */
export class AuthError extends NetsnapError {
  constructor(reason: string = 'Authentication failed', device?: string) {
    super(
      ErrorCodes.AUTH_FAILED,
      reason,
      'Check DEVICE_USERNAME and DEVICE_PASSWORD',
      device,
    );
    this.name = 'AuthError';
  }
}

/**
 * Error: Command did not complete within its bound
 */
export class TimeoutError extends NetsnapError {
  constructor(
    public readonly timeoutMs: number,
    device?: string,
  ) {
    super(
      ErrorCodes.TIMEOUT,
      `Command timed out after ${timeoutMs}ms`,
      'Raise COMMAND_TIMEOUT_MS if the device is slow to print its configuration',
      device,
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error: Remote command reported a non-zero exit status
 */
export class CommandError extends NetsnapError {
  constructor(
    public readonly exitCode: number,
    public readonly stderr: string,
    device?: string,
  ) {
    super(
      ErrorCodes.COMMAND_FAILED,
      stderr
        ? `Command exited with status ${exitCode}: ${stderr.trim()}`
        : `Command exited with status ${exitCode}`,
      'Check that BACKUP_COMMAND is valid for this device',
      device,
    );
    this.name = 'CommandError';
  }
}

/**
 * Error: Snapshot could not be written or rotated
 */
export class StorageError extends NetsnapError {
  constructor(reason: string, device?: string) {
    super(
      ErrorCodes.STORAGE_FAILED,
      `Storage failed: ${reason}`,
      'Check free space and permissions of BACKUP_DIR',
      device,
    );
    this.name = 'StorageError';
  }
}

/**
 * Error: A snapshot with the same name already exists
 */
export class ConflictError extends NetsnapError {
  constructor(
    public readonly path: string,
    device?: string,
  ) {
    super(
      ErrorCodes.CONFLICT,
      `Snapshot already exists: ${path}`,
      undefined,
      device,
    );
    this.name = 'ConflictError';
  }
}

/**
 * Error: Snapshot could not be recorded in history (non-fatal)
 */
export class HistoryError extends NetsnapError {
  constructor(reason: string, device?: string) {
    super(
      ErrorCodes.HISTORY_FAILED,
      `History recording failed: ${reason}`,
      undefined,
      device,
    );
    this.name = 'HistoryError';
  }
}

/**
 * Error: Another run holds the store root lock
 */
export class RunInProgressError extends NetsnapError {
  constructor(
    public readonly lockPath: string,
    public readonly ownerPid?: number,
  ) {
    super(
      ErrorCodes.RUN_IN_PROGRESS,
      ownerPid !== undefined
        ? `Another run is in progress (pid ${ownerPid}, lock ${lockPath})`
        : `Another run is in progress (lock ${lockPath})`,
      'Wait for the current run to finish, or remove the lock file if no run is active',
    );
    this.name = 'RunInProgressError';
  }
}

/**
 * Error: Configuration is missing or invalid
 */
export class ConfigError extends NetsnapError {
  constructor(public readonly issues: string[]) {
    super(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${issues.join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

/**
 * Error: Report could not be delivered
 */
export class NotifyError extends NetsnapError {
  constructor(reason: string) {
    super(ErrorCodes.NOTIFY_FAILED, `Notification failed: ${reason}`);
    this.name = 'NotifyError';
  }
}

/**
 * Describe any thrown value as the `{ name, code, message }` triple stored on failed results.
 */
export function toFailureInfo(error: unknown): { name: string; code: string; message: string } {
  if (error instanceof NetsnapError) {
    return error.toErrorInfo();
  }
  if (error instanceof Error) {
    return { name: error.name, code: UNKNOWN_ERROR_CODE, message: error.message };
  }
  return { name: 'Error', code: UNKNOWN_ERROR_CODE, message: String(error) };
}
