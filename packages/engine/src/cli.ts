/**
 * Backup job entry point
 *
 * One invocation, one full run. Exit status: 0 when every device succeeded,
 * 1 when any device failed, 2 when the run could not start.
 */

import { mkdir } from 'node:fs/promises';
import { config as loadDotenv } from 'dotenv';
import {
  ConfigError,
  NetsnapError,
  RunInProgressError,
  type AggregateReport,
  type DeviceSession,
  type HistoryRecorder,
  type Notifier,
} from '@netsnap/core';
import { SshDeviceSession } from '@netsnap/transport-ssh';
import { GitHistoryRecorder } from '@netsnap/history-git';
import { loadConfig, printConfig, toDeviceTargets, type BackupConfig } from './config.js';
import { RunCoordinator } from './coordinator.js';
import { SnapshotStore } from './snapshot-store.js';
import { TelegramNotifier } from './notifier/index.js';

export const ExitCodes = {
  OK: 0,
  DEVICE_FAILED: 1,
  NOT_STARTED: 2,
  SIGINT: 130,
  SIGTERM: 143,
} as const;

/**
 * Collaborators to use instead of the ones built from the configuration.
 * `null` disables history or notification outright.
 */
export interface RunDependencies {
  session?: DeviceSession;
  history?: HistoryRecorder | null;
  notifier?: Notifier | null;
}

async function createHistory(config: BackupConfig): Promise<HistoryRecorder | undefined> {
  if (!config.git.enabled) return undefined;

  const recorder = new GitHistoryRecorder({
    repoDir: config.backupDir,
    authorName: config.git.authorName,
    authorEmail: config.git.authorEmail,
  });
  try {
    await mkdir(config.backupDir, { recursive: true });
    await recorder.initialize();
    return recorder;
  } catch (error) {
    console.warn(
      `[Netsnap:History] Git history unavailable, snapshots will only be kept on disk: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return undefined;
  }
}

function createNotifier(config: BackupConfig): Notifier | undefined {
  if (!config.telegram) {
    console.log('[Netsnap:Notify] Telegram credentials not configured. Skipping notification.');
    return undefined;
  }
  return new TelegramNotifier(config.telegram);
}

async function deliver(notifier: Notifier | undefined, report: AggregateReport): Promise<void> {
  if (!notifier || report.total === 0) return;
  try {
    await notifier.send(report);
  } catch (error) {
    console.error(
      `[Netsnap:Notify] Failed to send notification: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export async function runBackup(config: BackupConfig, deps: RunDependencies = {}): Promise<number> {
  const history = deps.history === undefined ? await createHistory(config) : deps.history ?? undefined;
  const notifier = deps.notifier === undefined ? createNotifier(config) : deps.notifier ?? undefined;

  const coordinator = new RunCoordinator({
    session: deps.session ?? new SshDeviceSession({ readyTimeoutMs: config.connectTimeoutMs }),
    store: new SnapshotStore({ rootDir: config.backupDir }),
    history,
    command: config.command,
    commandTimeoutMs: config.commandTimeoutMs,
    maxBackups: config.maxBackups,
    concurrency: config.concurrency,
  });

  // Published snapshots are complete files, so stopping mid-run only needs the lock released
  const onSignal = (signal: 'SIGINT' | 'SIGTERM') => {
    console.log(`\n[Netsnap:Run] ${signal} received, shutting down...`);
    void coordinator.shutdown().finally(() => process.exit(ExitCodes[signal]));
  };
  const onSigint = () => onSignal('SIGINT');
  const onSigterm = () => onSignal('SIGTERM');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  let report: AggregateReport;
  try {
    report = await coordinator.run(toDeviceTargets(config));
  } catch (error) {
    if (error instanceof RunInProgressError) {
      console.error(`[Netsnap:Run] ${error.message}`);
      return ExitCodes.NOT_STARTED;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  }

  await deliver(notifier, report);
  return report.failed > 0 ? ExitCodes.DEVICE_FAILED : ExitCodes.OK;
}

/**
 * Without `env`, variables come from the process environment plus `.env` in the working directory.
 */
export async function main(env?: Record<string, string | undefined>): Promise<number> {
  if (env === undefined) {
    const loaded = loadDotenv();
    if (loaded.parsed) {
      console.log('[Netsnap:Config] Loaded .env');
    }
  }

  let config: BackupConfig;
  try {
    config = loadConfig(env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Netsnap:Config] ${error.message}`);
      return ExitCodes.NOT_STARTED;
    }
    throw error;
  }

  printConfig(config);

  try {
    return await runBackup(config);
  } catch (error) {
    const detail = error instanceof NetsnapError && error.hint ? ` (${error.hint})` : '';
    console.error(`[Netsnap:Run] Backup job aborted: ${error instanceof Error ? error.message : String(error)}${detail}`);
    return ExitCodes.NOT_STARTED;
  }
}
