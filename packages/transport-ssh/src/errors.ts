import { AuthError, CommandError, ConnectError, NetsnapError } from '@netsnap/core';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * Map an error raised while opening an SSH session onto the netsnap taxonomy.
 *
 * ssh2 tags its errors with `level`; socket errors carry a Node `code`.
 */
export function classifySshError(error: unknown, host: string): NetsnapError {
  if (error instanceof NetsnapError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const level = readStringProperty(error, 'level');
  const code = readStringProperty(error, 'code');

  if (level === 'client-authentication') {
    return new AuthError(`Authentication rejected by ${host}: ${message}`, host);
  }
  if (level === 'client-timeout') {
    return new ConnectError(`SSH handshake with ${host} timed out`, host);
  }
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return new ConnectError(`${code} ${message}`, host);
  }
  return new ConnectError(message, host);
}

/**
 * Map an error raised while running a command on an authenticated session.
 *
 * Socket errors still mean the device went away; anything else (channel open
 * refused, exec request denied) is a command failure.
 */
export function classifyExecError(error: unknown, host: string): NetsnapError {
  if (error instanceof NetsnapError) return error;

  const code = readStringProperty(error, 'code');
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return classifySshError(error, host);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CommandError(-1, `exec request failed: ${message}`, host);
}
