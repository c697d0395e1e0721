import type { Db } from './db.js';
import type { LockClient } from './locks.js';
import type { Logger } from './logger.js';

/**
 * Everything a ledger operation needs besides its arguments.
 * There is no tenant in here: every operation takes tenantId explicitly.
 */
export type LedgerContext = {
  db: Db;
  logger: Logger;
  /** Optional Redis client for best-effort locks. */
  redis?: LockClient | null;
  lockTtlMs: number;
};
