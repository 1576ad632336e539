/**
 * @netsnap/transport-ssh
 *
 * DeviceSession over SSH for network devices.
 */

export { SshDeviceSession, DEFAULT_READY_TIMEOUT_MS } from './device-session.js';
export { Ssh2Connector } from './ssh2-connector.js';
export { classifyExecError, classifySshError } from './errors.js';

export type {
  SshConnectParams,
  SshConnection,
  SshConnector,
  SshSessionConfig,
  ExecResult,
} from './types.js';
