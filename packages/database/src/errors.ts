/**
 * Classification of durable-store errors.
 * The writer retries connection-class errors; anything else is a data error.
 */

const SOCKET_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

// Raised by postgres-js itself
const DRIVER_ERROR_CODES = new Set([
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

// admin_shutdown, crash_shutdown, cannot_connect_now, too_many_connections
const SERVER_CONNECTION_STATES = new Set(['57P01', '57P02', '57P03', '53300']);

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== null) {
    if (SOCKET_ERROR_CODES.has(code) || DRIVER_ERROR_CODES.has(code)) return true;
    // SQLSTATE class 08: connection exception
    if (/^08[0-9A-Z]{3}$/.test(code) || SERVER_CONNECTION_STATES.has(code)) return true;
  }

  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return isConnectionError(error.cause);
  }
  return false;
}
