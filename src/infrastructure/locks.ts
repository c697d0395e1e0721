import { randomUUID } from 'node:crypto';
import { TransientError } from './errors.js';
import { logger } from './logger.js';

/** The two ioredis calls the lock makes; an ioredis `Redis` satisfies it, and so can an in-process stand-in. */
export type LockClient = {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
};

export type ReleaseLock = () => Promise<void>;

// Deletes the key only while it still carries our token.
const COMPARE_AND_DELETE = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  end
  return 0
`;

/** `SET key token NX PX ttl`. Null when the key is already taken. */
export async function acquireLock(redis: LockClient, key: string, ttlMs = 10_000): Promise<ReleaseLock | null> {
  const token = randomUUID();
  if ((await redis.set(key, token, 'PX', ttlMs, 'NX')) !== 'OK') return null;

  return async () => {
    try {
      await redis.eval(COMPARE_AND_DELETE, 1, key, token);
    } catch (err) {
      logger.warn({ err, key, ttlMs }, 'lock release failed, key left to expire');
    }
  };
}

type LockAttempt = { state: 'held'; release: ReleaseLock } | { state: 'busy' } | { state: 'unavailable' };

async function tryLock(redis: LockClient, key: string, ttlMs: number): Promise<LockAttempt> {
  try {
    const release = await acquireLock(redis, key, ttlMs);
    return release ? { state: 'held', release } : { state: 'busy' };
  } catch (err) {
    logger.warn({ err, key }, 'lock unavailable, continuing without it');
    return { state: 'unavailable' };
  }
}

/**
 * Runs `work` under `key` when a client is configured and reachable, unlocked
 * otherwise. A key held by another caller is a TransientError.
 */
export async function withLockBestEffort<T>(
  redis: LockClient | null | undefined,
  key: string,
  ttlMs: number,
  work: () => Promise<T>
): Promise<T> {
  const attempt: LockAttempt = redis ? await tryLock(redis, key, ttlMs) : { state: 'unavailable' };
  switch (attempt.state) {
    case 'busy':
      throw new TransientError('resource is locked', { details: { lockKey: key } });
    case 'unavailable':
      return await work();
    case 'held':
      try {
        return await work();
      } finally {
        await attempt.release();
      }
  }
}
