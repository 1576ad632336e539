/**
 * Netsnap Run Configuration
 *
 * Environment-style key/value configuration, validated with zod.
 */

import { z } from 'zod';
import { ConfigError, type DeviceTarget } from '@netsnap/core';

// ========== Config ==========

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface GitConfig {
  enabled: boolean;
  authorName: string;
  authorEmail: string;
}

export interface BackupConfig {
  hosts: string[];
  port: number;
  credentials: {
    username: string;
    password: string;
  };
  backupDir: string;
  maxBackups: number;
  command: string;
  commandTimeoutMs: number;
  connectTimeoutMs: number;
  concurrency: number;
  git: GitConfig;
  /** Absent when either the token or the chat id is missing */
  telegram?: TelegramConfig;
}

// ========== Defaults ==========

export const DEFAULT_BACKUP = {
  port: 22,
  backupDir: '/backups',
  maxBackups: 10,
  command: 'show running-config',
  commandTimeoutMs: 60000,                // 60 seconds
  connectTimeoutMs: 30000,                // 30 seconds
  concurrency: 1,
  git: {
    enabled: true,
    authorName: 'netsnap',
    authorEmail: 'netsnap@localhost',
  },
} as const;

// ========== Schema ==========

// Unset and empty variables are treated the same
const unsetIfEmpty = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const text = () => z.preprocess(unsetIfEmpty, z.string().trim().optional());
const integer = () => z.preprocess(unsetIfEmpty, z.coerce.number().int().optional());
const flag = () =>
  z
    .preprocess(
      value => {
        const set = unsetIfEmpty(value);
        return typeof set === 'string' ? set.trim().toLowerCase() : set;
      },
      z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional(),
    )
    .transform(value => (value === undefined ? undefined : value === 'true' || value === '1' || value === 'yes'));

export function parseHostList(value: string): string[] {
  const hosts = value
    .split(',')
    .map(host => host.trim())
    .filter(host => host.length > 0);
  return [...new Set(hosts)];
}

const envSchema = z.object({
  ROUTER_HOSTS: text()
    .pipe(z.string({ required_error: 'Required' }))
    .transform(parseHostList)
    .refine(hosts => hosts.length > 0, 'At least one device address is required'),
  PORT: integer().pipe(z.number().min(1).max(65535).default(DEFAULT_BACKUP.port)),
  DEVICE_USERNAME: text().pipe(z.string({ required_error: 'Required' })),
  DEVICE_PASSWORD: z.string({ required_error: 'Required' }).min(1, 'Required'),
  BACKUP_DIR: text().pipe(z.string().default(DEFAULT_BACKUP.backupDir)),
  MAX_BACKUPS: integer().pipe(z.number().min(0).default(DEFAULT_BACKUP.maxBackups)),
  BACKUP_COMMAND: text().pipe(z.string().default(DEFAULT_BACKUP.command)),
  COMMAND_TIMEOUT_MS: integer().pipe(z.number().positive().default(DEFAULT_BACKUP.commandTimeoutMs)),
  CONNECT_TIMEOUT_MS: integer().pipe(z.number().positive().default(DEFAULT_BACKUP.connectTimeoutMs)),
  MAX_CONCURRENCY: integer().pipe(z.number().min(1).default(DEFAULT_BACKUP.concurrency)),
  GIT_ENABLED: flag().pipe(z.boolean().default(DEFAULT_BACKUP.git.enabled)),
  GIT_AUTHOR_NAME: text().pipe(z.string().default(DEFAULT_BACKUP.git.authorName)),
  GIT_AUTHOR_EMAIL: text().pipe(z.string().default(DEFAULT_BACKUP.git.authorEmail)),
  TELEGRAM_BOT_TOKEN: text().pipe(z.string().optional()),
  TELEGRAM_CHAT_ID: text().pipe(z.string().optional()),
});

// ========== Resolved ==========

export function loadConfig(env: Record<string, string | undefined>): BackupConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const telegram =
    values.TELEGRAM_BOT_TOKEN !== undefined && values.TELEGRAM_CHAT_ID !== undefined
      ? { botToken: values.TELEGRAM_BOT_TOKEN, chatId: values.TELEGRAM_CHAT_ID }
      : undefined;

  return {
    hosts: values.ROUTER_HOSTS,
    port: values.PORT,
    credentials: {
      username: values.DEVICE_USERNAME,
      password: values.DEVICE_PASSWORD,
    },
    backupDir: values.BACKUP_DIR,
    maxBackups: values.MAX_BACKUPS,
    command: values.BACKUP_COMMAND,
    commandTimeoutMs: values.COMMAND_TIMEOUT_MS,
    connectTimeoutMs: values.CONNECT_TIMEOUT_MS,
    concurrency: values.MAX_CONCURRENCY,
    git: {
      enabled: values.GIT_ENABLED,
      authorName: values.GIT_AUTHOR_NAME,
      authorEmail: values.GIT_AUTHOR_EMAIL,
    },
    ...(telegram ? { telegram } : {}),
  };
}

export function toDeviceTargets(config: BackupConfig): DeviceTarget[] {
  return config.hosts.map(address => ({
    address,
    port: config.port,
    credentials: { ...config.credentials },
  }));
}

/**
 * Print configuration without secrets
 */
export function printConfig(config: BackupConfig): void {
  console.log('\n=== Netsnap Configuration ===');
  console.log(`Devices:        ${config.hosts.join(', ')}`);
  console.log(`SSH:            ${config.credentials.username}@<device>:${config.port}`);
  console.log(`Command:        ${config.command} (timeout ${config.commandTimeoutMs}ms)`);
  console.log(`Backup dir:     ${config.backupDir}`);
  console.log(`Max backups:    ${config.maxBackups > 0 ? config.maxBackups : 'unbounded'}`);
  console.log(`Concurrency:    ${config.concurrency}`);
  console.log(`Git history:    ${config.git.enabled ? 'enabled' : 'disabled'}`);
  console.log(`Telegram:       ${config.telegram ? 'enabled' : 'disabled'}`);
  console.log('=============================\n');
}
