import { randomUUID } from 'node:crypto';
import { HARDCODED_CONFIG } from '@candlesync/schemas';
import { createLogger, type Logger } from '@candlesync/utils';
import type { RedisCommands } from '../client';
import { LOCK_KEY_PATTERN } from '../keys';
import { EXTEND_LOCK_SCRIPT, RELEASE_LOCK_SCRIPT } from './scripts';

export type LockOutcome<T> = { acquired: true; result: T } | { acquired: false };

/**
 * Thrown by `LockLease.renew()` once the lock expired and another worker took it
 */
export class LockLostError extends Error {
  constructor(readonly key: string) {
    super(`Lock ${key} is no longer held`);
    this.name = 'LockLostError';
  }
}

/**
 * Handed to a `withLock` callback so long-running work can keep its lock
 */
export interface LockLease {
  readonly key: string;
  /** Push the expiry one TTL forward, or throw `LockLostError` */
  renew(): Promise<void>;
}

/**
 * DistributedLock
 *
 * TTL-bounded mutual exclusion across worker processes:
 * - acquire: SET key token PX ttl NX (refusal means another worker owns the key)
 * - release/extend: compare-and-act Lua scripts, so a holder whose lock expired
 *   and was taken over cannot touch the new owner's key
 * - expiry is the only unconditional release
 */
export class DistributedLock {
  private readonly logger: Logger;

  constructor(
    private readonly redis: RedisCommands,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('cache:lock');
  }

  /**
   * @returns the owner token, or null when the key is already held
   */
  async acquire(key: string, ttlMs: number = HARDCODED_CONFIG.locks.ttlMs): Promise<string | null> {
    const token = randomUUID();
    const result = await this.redis.set(key, token, 'PX', ttlMs, 'NX');
    if (result !== 'OK') {
      this.logger.debug({ key }, 'Lock refused');
      return null;
    }
    this.logger.debug({ key, ttlMs }, 'Lock acquired');
    return token;
  }

  /**
   * Delete the key only if it still holds `token`
   *
   * @returns true if this call removed the lock
   */
  async release(key: string, token: string): Promise<boolean> {
    const deleted = await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
    const released = deleted === 1;
    if (!released) {
      this.logger.warn({ key }, 'Lock release skipped: token no longer owns the key');
    }
    return released;
  }

  /**
   * Push the expiry of a held lock forward
   *
   * @returns false if the lock was lost
   */
  async extend(key: string, token: string, ttlMs: number): Promise<boolean> {
    const extended = await this.redis.eval(EXTEND_LOCK_SCRIPT, 1, key, token, ttlMs);
    return extended === 1;
  }

  /**
   * Run `fn` while holding `key`.
   * A refused lock is a normal skip signal, not an error.
   */
  async withLock<T>(
    key: string,
    fn: (lease: LockLease) => Promise<T>,
    ttlMs: number = HARDCODED_CONFIG.locks.ttlMs
  ): Promise<LockOutcome<T>> {
    const token = await this.acquire(key, ttlMs);
    if (!token) {
      return { acquired: false };
    }

    const lease: LockLease = {
      key,
      renew: async () => {
        if (!(await this.extend(key, token, ttlMs))) {
          throw new LockLostError(key);
        }
      },
    };

    try {
      const result = await fn(lease);
      return { acquired: true, result };
    } finally {
      await this.release(key, token);
    }
  }

  /**
   * Keys of currently held locks (diagnostics)
   */
  async listLocks(pattern: string = LOCK_KEY_PATTERN): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys.sort();
  }
}
