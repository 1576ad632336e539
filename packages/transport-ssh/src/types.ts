export interface SshConnectParams {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Bound for TCP connect, handshake and authentication */
  readyTimeoutMs: number;
}

export interface ExecResult {
  stdout: Buffer;
  stderr: Buffer;
  /** null when the server did not report an exit status */
  exitCode: number | null;
  signal?: string;
}

/**
 * An authenticated SSH connection able to run one command at a time.
 */
export interface SshConnection {
  exec(command: string): Promise<ExecResult>;
  close(): void;
}

export interface SshConnector {
  connect(params: SshConnectParams): Promise<SshConnection>;
}

export interface SshSessionConfig {
  connector?: SshConnector;
  readyTimeoutMs?: number;
  /** Clock used to stamp captures */
  now?: () => Date;
}
