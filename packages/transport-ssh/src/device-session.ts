/**
 * SSH Device Session
 *
 * Connects to one device, runs a single non-interactive command (no PTY, so no
 * pager or prompt handling), reads its complete output and disconnects.
 */

import {
  CommandError,
  ConnectError,
  TimeoutError,
  withTimeout,
  type CaptureOptions,
  type CapturedConfig,
  type DeviceSession,
  type DeviceTarget,
} from '@netsnap/core';
import { classifyExecError, classifySshError } from './errors.js';
import { Ssh2Connector } from './ssh2-connector.js';
import type { SshConnection, SshConnector, SshSessionConfig } from './types.js';

export const DEFAULT_READY_TIMEOUT_MS = 30000;

export class SshDeviceSession implements DeviceSession {
  private connector: SshConnector;
  private readyTimeoutMs: number;
  private now: () => Date;

  constructor(config: SshSessionConfig = {}) {
    this.connector = config.connector ?? new Ssh2Connector();
    this.readyTimeoutMs = config.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.now = config.now ?? (() => new Date());
  }

  async capture(target: DeviceTarget, command: string, options: CaptureOptions): Promise<CapturedConfig> {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new RangeError(`Command timeout must be a positive number, got ${options.timeoutMs}`);
    }

    const { address } = target;
    console.log(`[Netsnap:Session] Connecting to ${address}:${target.port}`);
    const connection = await this.open(target);

    try {
      const result = await withTimeout(
        connection.exec(command),
        options.timeoutMs,
        () => new TimeoutError(options.timeoutMs, address),
      ).catch((error: unknown) => {
        throw classifyExecError(error, address);
      });

      const stderr = result.stderr.toString('utf8');
      if (result.signal !== undefined) {
        throw new CommandError(-1, `terminated by signal ${result.signal}`, address);
      }
      if (result.exitCode !== null && result.exitCode !== 0) {
        throw new CommandError(result.exitCode, stderr, address);
      }

      const captured: CapturedConfig = {
        target,
        text: result.stdout.toString('utf8'),
        capturedAt: this.now(),
      };
      if (stderr.trim()) {
        console.warn(`[Netsnap:Session] ${address} wrote to stderr: ${stderr.trim()}`);
        captured.stderr = stderr;
      }

      console.log(`[Netsnap:Session] Captured ${result.stdout.length} bytes from ${address}`);
      return captured;
    } finally {
      connection.close();
    }
  }

  private async open(target: DeviceTarget): Promise<SshConnection> {
    const pending = this.connector.connect({
      host: target.address,
      port: target.port,
      username: target.credentials.username,
      password: target.credentials.password,
      readyTimeoutMs: this.readyTimeoutMs,
    });

    try {
      return await withTimeout(
        pending,
        this.readyTimeoutMs,
        () => new ConnectError(`no SSH session with ${target.address} within ${this.readyTimeoutMs}ms`, target.address),
      );
    } catch (error) {
      // A connection that completes after the deadline is closed straight away
      void pending.then(
        connection => connection.close(),
        () => undefined,
      );
      throw classifySshError(error, target.address);
    }
  }
}
