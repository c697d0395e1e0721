import { Redis } from 'ioredis';
import { logger } from './logger.js';

let shared: Redis | null = null;

/**
 * Process-wide client for proxy split locks. Connects in the background and
 * fails fast per command, so an unreachable server only costs the lock.
 */
export function getRedis(url: string): Redis {
  if (shared) return shared;

  const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  redis.on('error', (err: unknown) => logger.warn({ err }, 'redis error'));
  redis.connect().catch((err: unknown) => logger.warn({ err, url: redactUrl(url) }, 'redis connect failed'));
  shared = redis;
  return redis;
}

function redactUrl(url: string): string {
  return url.replace(/\/\/[^@/]*@/, '//***@');
}

export async function closeRedis(): Promise<void> {
  const redis = shared;
  shared = null;
  if (redis) await redis.quit();
}
