/**
 * @netsnap/engine
 *
 * Backup orchestration: snapshot store, run coordinator, reporting and the
 * job entry point.
 */

export { SnapshotStore, snapshotFileName, parseSnapshotFileName, SNAPSHOT_EXTENSION } from './snapshot-store.js';
export type { SnapshotStoreConfig } from './snapshot-store.js';

export { RunLock, LOCK_FILE_NAME, isProcessAlive } from './run-lock.js';
export type { RunLockOptions, LockOwner } from './run-lock.js';

export { RunCoordinator } from './coordinator.js';
export type { RunCoordinatorOptions, RunHooks } from './coordinator.js';

export {
  buildReport,
  renderReport,
  chunkMessage,
  escapeHtml,
  formatDateTime,
  formatSeconds,
  formatKilobytes,
  CHUNK_MAX,
} from './report.js';

export { TelegramNotifier, TELEGRAM_API_BASE_URL } from './notifier/index.js';
export type { TelegramNotifierConfig } from './notifier/index.js';

export { loadConfig, toDeviceTargets, printConfig, parseHostList, DEFAULT_BACKUP } from './config.js';
export type { BackupConfig, GitConfig, TelegramConfig } from './config.js';

export { runBackup, main, ExitCodes } from './cli.js';
export type { RunDependencies } from './cli.js';
