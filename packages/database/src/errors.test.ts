import { describe, expect, it } from 'vitest';
import { isConnectionError } from './errors';

function withCode(code: string, message = 'failed'): Error {
  return Object.assign(new Error(message), { code });
}

describe('isConnectionError()', () => {
  it('recognises socket failures', () => {
    expect(isConnectionError(withCode('ECONNREFUSED'))).toBe(true);
    expect(isConnectionError(withCode('ECONNRESET'))).toBe(true);
  });

  it('recognises postgres-js connection errors', () => {
    expect(isConnectionError(withCode('CONNECTION_CLOSED'))).toBe(true);
    expect(isConnectionError(withCode('CONNECT_TIMEOUT'))).toBe(true);
  });

  it('recognises connection-class SQLSTATEs', () => {
    expect(isConnectionError(withCode('08006'))).toBe(true);
    expect(isConnectionError(withCode('57P01'))).toBe(true);
    expect(isConnectionError(withCode('53300'))).toBe(true);
  });

  it('treats data errors as permanent', () => {
    expect(isConnectionError(withCode('23505', 'duplicate key value'))).toBe(false);
    expect(isConnectionError(withCode('22003', 'numeric field overflow'))).toBe(false);
    expect(isConnectionError(new Error('no code'))).toBe(false);
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });

  it('follows the error cause', () => {
    const wrapped = new Error('query failed', { cause: withCode('ETIMEDOUT') });

    expect(isConnectionError(wrapped)).toBe(true);
  });
});
