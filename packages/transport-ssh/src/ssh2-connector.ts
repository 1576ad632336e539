/**
 * ssh2-backed connector
 *
 * Password authentication with keyboard-interactive fallback, no agent and no
 * local keys. Host keys are accepted without verification.
 */

import { Client } from 'ssh2';
import { ConnectError } from '@netsnap/core';
import { classifySshError } from './errors.js';
import type { ExecResult, SshConnectParams, SshConnection, SshConnector } from './types.js';

class Ssh2Connection implements SshConnection {
  constructor(
    private client: Client,
    private host: string,
  ) {}

  /**
   * Run `command` and collect its complete output.
   *
   * Resolves once the channel closes after an exit status, or after a clean
   * end of output on a connection that is still up. Losing the connection
   * before either rejects with ConnectError, so partial output is never
   * returned.
   */
  exec(command: string): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      let connectionLost: Error | undefined;
      const onClientError = (error: Error) => {
        if (!connectionLost) connectionLost = error;
      };
      const onClientClose = () => {
        if (!connectionLost) connectionLost = new Error('connection closed');
      };
      const detach = () => {
        this.client.off('error', onClientError);
        this.client.off('end', onClientClose);
        this.client.off('close', onClientClose);
      };
      this.client.on('error', onClientError);
      this.client.on('end', onClientClose);
      this.client.on('close', onClientClose);

      this.client.exec(command, (error, channel) => {
        if (error) {
          detach();
          reject(error);
          return;
        }

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode: number | null = null;
        let signal: string | undefined;
        let exited = false;
        let endOfOutput = false;

        channel.on('data', (chunk: Buffer) => {
          stdout.push(chunk);
        });
        channel.stderr.on('data', (chunk: Buffer) => {
          stderr.push(chunk);
        });
        channel.on('end', () => {
          endOfOutput = true;
        });

        // (code) on normal exit, (null, signalName, ...) when killed by a signal
        channel.on('exit', (...args: unknown[]) => {
          const [code, signalName] = args;
          exited = true;
          exitCode = typeof code === 'number' ? code : null;
          signal = typeof signalName === 'string' ? signalName : undefined;
        });

        channel.on('close', () => {
          // The client reports a dropped socket in the same turn it tears its channels down
          setImmediate(() => {
            detach();
            if (!exited && (connectionLost !== undefined || !endOfOutput)) {
              const reason = connectionLost?.message ?? 'channel closed';
              reject(
                new ConnectError(`${this.host} dropped the session before the command finished (${reason})`, this.host),
              );
              return;
            }
            resolve({
              stdout: Buffer.concat(stdout),
              stderr: Buffer.concat(stderr),
              exitCode,
              signal,
            });
          });
        });

        channel.on('error', (channelError: Error) => {
          detach();
          reject(channelError);
        });
      });
    });
  }

  close(): void {
    this.client.end();
    console.log(`[Netsnap:SSH] Closed session to ${this.host}`);
  }
}

export class Ssh2Connector implements SshConnector {
  connect(params: SshConnectParams): Promise<SshConnection> {
    const client = new Client();

    return new Promise((resolve, reject) => {
      let settled = false;

      client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => params.password));
      });

      client.once('ready', () => {
        settled = true;
        resolve(new Ssh2Connection(client, params.host));
      });

      client.on('error', (error) => {
        if (!settled) {
          settled = true;
          client.end();
          reject(classifySshError(error, params.host));
          return;
        }
        console.warn(`[Netsnap:SSH] ${params.host}: ${error.message}`);
      });

      client.once('close', () => {
        if (!settled) {
          settled = true;
          reject(new ConnectError(`${params.host} closed the connection before authentication`, params.host));
        }
      });

      client.connect({
        host: params.host,
        port: params.port,
        username: params.username,
        password: params.password,
        tryKeyboard: true,
        readyTimeout: params.readyTimeoutMs,
      });
    });
  }
}
