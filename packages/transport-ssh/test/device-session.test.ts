/**
 * SSH Device Session Tests
 *
 * Drive the session through an in-memory connector; no SSH server is involved.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AuthError,
  CommandError,
  ConnectError,
  TimeoutError,
  type DeviceTarget,
} from '@netsnap/core';
import { SshDeviceSession } from '../src/device-session.js';
import type { ExecResult, SshConnectParams, SshConnection, SshConnector } from '../src/types.js';

class FakeConnection implements SshConnection {
  commands: string[] = [];
  closeCount = 0;

  constructor(private run: () => Promise<ExecResult>) {}

  exec(command: string): Promise<ExecResult> {
    this.commands.push(command);
    return this.run();
  }

  close(): void {
    this.closeCount++;
  }
}

class FakeConnector implements SshConnector {
  calls: SshConnectParams[] = [];

  constructor(private open: () => Promise<SshConnection>) {}

  connect(params: SshConnectParams): Promise<SshConnection> {
    this.calls.push(params);
    return this.open();
  }
}

function execResult(stdout: string, exitCode: number | null = 0, stderr = ''): ExecResult {
  return { stdout: Buffer.from(stdout), stderr: Buffer.from(stderr), exitCode };
}

function authError(): Error {
  return Object.assign(new Error('All configured authentication methods failed'), {
    level: 'client-authentication',
  });
}

describe('SshDeviceSession', () => {
  const target: DeviceTarget = {
    address: '192.0.2.11',
    port: 2222,
    credentials: { username: 'backup', password: 'test-secret' },
  };
  const capturedAt = new Date(2024, 2, 4, 5, 6, 7);

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should capture the full output and close the connection', async () => {
    const connection = new FakeConnection(async () => execResult('hostname core-sw1\n'));
    const connector = new FakeConnector(async () => connection);
    const session = new SshDeviceSession({ connector, readyTimeoutMs: 1000, now: () => capturedAt });

    const captured = await session.capture(target, 'show running-config', { timeoutMs: 1000 });

    expect(captured.text).toBe('hostname core-sw1\n');
    expect(captured.capturedAt).toBe(capturedAt);
    expect(captured.target).toBe(target);
    expect(captured.stderr).toBeUndefined();
    expect(connection.commands).toEqual(['show running-config']);
    expect(connection.closeCount).toBe(1);
  });

  it('should pass address, port and credentials to the connector', async () => {
    const connector = new FakeConnector(async () => new FakeConnection(async () => execResult('')));
    const session = new SshDeviceSession({ connector, readyTimeoutMs: 1500 });

    await session.capture(target, 'show running-config', { timeoutMs: 1000 });

    expect(connector.calls).toEqual([
      {
        host: '192.0.2.11',
        port: 2222,
        username: 'backup',
        password: 'test-secret',
        readyTimeoutMs: 1500,
      },
    ]);
  });

  it('should accept output when the exit status is not reported', async () => {
    const connection = new FakeConnection(async () => execResult('config', null));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const captured = await session.capture(target, 'show running-config', { timeoutMs: 1000 });
    expect(captured.text).toBe('config');
  });

  it('should keep stderr from a successful command and warn about it', async () => {
    const connection = new FakeConnection(async () => execResult('config', 0, 'deprecated command\n'));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const captured = await session.capture(target, 'show running-config', { timeoutMs: 1000 });

    expect(captured.stderr).toBe('deprecated command\n');
    expect(console.warn).toHaveBeenCalledWith(
      '[Netsnap:Session] 192.0.2.11 wrote to stderr: deprecated command',
    );
  });

  it('should replace invalid UTF-8 sequences', async () => {
    const bytes = Buffer.from([0x61, 0xff, 0x62]);
    const connection = new FakeConnection(async () => ({ stdout: bytes, stderr: Buffer.alloc(0), exitCode: 0 }));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const captured = await session.capture(target, 'show running-config', { timeoutMs: 1000 });
    expect(captured.text).toBe('a\ufffdb');
  });

  it('should fail with CommandError on non-zero exit status', async () => {
    const connection = new FakeConnection(async () => execResult('', 1, '% Invalid input'));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const error = await session.capture(target, 'show bogus', { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ exitCode: 1, stderr: '% Invalid input', device: '192.0.2.11' });
    expect(connection.closeCount).toBe(1);
  });

  it('should fail with CommandError when the command is killed by a signal', async () => {
    const connection = new FakeConnection(async () => ({
      stdout: Buffer.from('partial'),
      stderr: Buffer.alloc(0),
      exitCode: null,
      signal: 'KILL',
    }));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    await expect(
      session.capture(target, 'show running-config', { timeoutMs: 1000 }),
    ).rejects.toThrow('Command exited with status -1: terminated by signal KILL');
  });

  it('should fail with TimeoutError and close the connection when the command hangs', async () => {
    const connection = new FakeConnection(() => new Promise<ExecResult>(() => {}));
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const error = await session.capture(target, 'show running-config', { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20, device: '192.0.2.11' });
    expect(connection.closeCount).toBe(1);
  });

  it('should classify channel errors during exec', async () => {
    const connection = new FakeConnection(async () => {
      throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    });
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const error = await session.capture(target, 'show running-config', { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectError);
    expect(connection.closeCount).toBe(1);
  });

  it('should report a refused exec request as a command failure', async () => {
    const connection = new FakeConnection(async () => {
      throw new Error('Unable to exec');
    });
    const session = new SshDeviceSession({ connector: new FakeConnector(async () => connection) });

    const error = await session.capture(target, 'show running-config', { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ exitCode: -1, device: '192.0.2.11' });
    expect(connection.closeCount).toBe(1);
  });

  it('should fail with AuthError when credentials are rejected', async () => {
    const session = new SshDeviceSession({
      connector: new FakeConnector(async () => {
        throw authError();
      }),
    });

    await expect(
      session.capture(target, 'show running-config', { timeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(AuthError);
  });

  it('should fail with ConnectError when the device refuses the connection', async () => {
    const session = new SshDeviceSession({
      connector: new FakeConnector(async () => {
        throw Object.assign(new Error('connect ECONNREFUSED 192.0.2.11:2222'), { code: 'ECONNREFUSED' });
      }),
    });

    await expect(
      session.capture(target, 'show running-config', { timeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(ConnectError);
  });

  it('should give up on a connection that never becomes ready and close it when it does', async () => {
    const late = new FakeConnection(async () => execResult(''));
    let finishConnect: (connection: SshConnection) => void = () => {};
    const connector = new FakeConnector(
      () => new Promise<SshConnection>((resolve) => {
        finishConnect = resolve;
      }),
    );
    const session = new SshDeviceSession({ connector, readyTimeoutMs: 20 });

    const error = await session.capture(target, 'show running-config', { timeoutMs: 1000 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectError);

    finishConnect(late);
    await new Promise(resolve => setImmediate(resolve));
    expect(late.closeCount).toBe(1);
    expect(late.commands).toEqual([]);
  });

  it('should refuse to run without a positive command timeout', async () => {
    const connector = new FakeConnector(async () => new FakeConnection(async () => execResult('')));
    const session = new SshDeviceSession({ connector });

    await expect(
      session.capture(target, 'show running-config', { timeoutMs: 0 }),
    ).rejects.toBeInstanceOf(RangeError);
    expect(connector.calls).toEqual([]);
  });
});
