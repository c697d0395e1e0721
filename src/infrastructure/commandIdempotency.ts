import { isUniqueViolation } from './db.js';
import { TransientError } from './errors.js';

type IdempotentResult<T> = { replay: boolean; response: T };

/**
 * Command-level idempotency for ledger writes.
 *
 * `findExisting` looks up the result of an earlier call with the same key, inside
 * the caller's transaction; when it finds one the stored result is replayed and
 * `work` does not run. A concurrent call that wins the race trips the
 * (tenant_id, key) unique constraint, which surfaces as TransientError so the
 * retry replays the winner's result.
 */
export async function runIdempotentCommand<T>(
  key: string | null | undefined,
  findExisting: (key: string) => Promise<T | undefined>,
  work: () => Promise<T>
): Promise<IdempotentResult<T>> {
  if (!key) return { replay: false, response: await work() };

  const existing = await findExisting(key);
  if (existing !== undefined) return { replay: true, response: existing };

  try {
    return { replay: false, response: await work() };
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new TransientError('concurrent request with the same idempotency key', {
        cause: err,
        details: { idempotencyKey: key },
      });
    }
    throw err;
  }
}
