import knex, { type Knex } from 'knex';
import { TransientError, isLedgerError } from './errors.js';

export type DbClient = 'pg' | 'better-sqlite3';
export type IsolationLevel = 'serializable' | 'repeatable read';

export type DbConfig = {
  client: DbClient;
  /** Postgres connection string, or a sqlite filename (`:memory:` for tests). */
  connection: string;
  poolMax?: number;
  isolationLevel?: IsolationLevel;
  txTimeoutMs?: number;
};

export type Db = {
  knex: Knex;
  client: DbClient;
  isolationLevel: IsolationLevel;
  txTimeoutMs: number;
};

type SqliteConnection = { pragma(source: string): unknown };

export function createDb(config: DbConfig): Db {
  const isolationLevel = config.isolationLevel ?? 'serializable';
  const txTimeoutMs = config.txTimeoutMs ?? 5_000;

  if (config.client === 'better-sqlite3') {
    const instance = knex({
      client: 'better-sqlite3',
      connection: { filename: config.connection },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        // sqlite leaves FK enforcement off per connection unless asked.
        afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
          conn.pragma('foreign_keys = ON');
          done(null, conn);
        },
      },
    });
    return { knex: instance, client: config.client, isolationLevel, txTimeoutMs };
  }

  const instance = knex({
    client: 'pg',
    connection: config.connection,
    pool: { min: 0, max: config.poolMax ?? 10 },
    acquireConnectionTimeout: txTimeoutMs,
  });
  return { knex: instance, client: config.client, isolationLevel, txTimeoutMs };
}

export async function closeDb(db: Db): Promise<void> {
  await db.knex.destroy();
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}

// 40001 serialization_failure, 40P01 deadlock_detected, 55P03 lock_not_available, 57014 query_canceled (statement_timeout)
const TRANSIENT_PG_CODES = new Set(['40001', '40P01', '55P03', '57014']);
const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

export function isTransientDbError(err: unknown): boolean {
  if (err instanceof Error && err.name === 'KnexTimeoutError') return true;
  const code = errorCode(err);
  if (!code) return false;
  return TRANSIENT_PG_CODES.has(code) || TRANSIENT_SQLITE_CODES.has(code);
}

export function isUniqueViolation(err: unknown): boolean {
  const code = errorCode(err);
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

export function isForeignKeyViolation(err: unknown): boolean {
  const code = errorCode(err);
  return code === '23503' || code === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

/**
 * Runs `work` inside one database transaction.
 *
 * On Postgres the transaction is opened at the configured isolation level
 * (serializable by default) with a per-transaction statement timeout, so the
 * read-then-write checks done inside `work` cannot interleave with a
 * concurrent writer. Contention and timeouts come back as TransientError;
 * nothing is retried here.
 */
export async function withTransaction<T>(db: Db, work: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
  try {
    if (db.client === 'pg') {
      const timeoutMs = Math.trunc(db.txTimeoutMs);
      return await db.knex.transaction(
        async (trx) => {
          // SET does not take bind parameters.
          await trx.raw(`set local statement_timeout = ${timeoutMs}`);
          return await work(trx);
        },
        { isolationLevel: db.isolationLevel }
      );
    }
    return await db.knex.transaction(async (trx) => await work(trx));
  } catch (err) {
    if (!isLedgerError(err) && isTransientDbError(err)) {
      throw new TransientError('storage contention, retry the operation', { cause: err });
    }
    throw err;
  }
}

/** Row lock for read-then-write checks; sqlite already serializes writers. */
export function forUpdate<TRecord extends {}, TResult>(
  db: Db,
  query: Knex.QueryBuilder<TRecord, TResult>
): Knex.QueryBuilder<TRecord, TResult> {
  return db.client === 'pg' ? query.forUpdate() : query;
}
