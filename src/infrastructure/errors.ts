export type LedgerErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'CONFLICT'
  | 'CAPACITY_EXCEEDED'
  | 'TRANSIENT';

export type LedgerErrorOptions = {
  cause?: unknown;
  details?: Record<string, unknown>;
};

/**
 * Base class for every error the ledger reports to its callers.
 *
 * `statusCode` follows HTTP semantics so a transport layer can map errors
 * without knowing the individual classes; `code` is the stable identifier.
 */
export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
  abstract readonly statusCode: number;
  readonly retryable: boolean = false;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }
}

/** Malformed input, rejected before any write. */
export class ValidationError extends LedgerError {
  readonly code = 'VALIDATION';
  readonly statusCode = 400;
}

/** Referenced entity is absent, or belongs to another tenant. */
export class NotFoundError extends LedgerError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

/** Operation is not permitted in the entity's current lifecycle state. */
export class InvalidStateError extends LedgerError {
  readonly code = 'INVALID_STATE';
  readonly statusCode = 409;
}

/** Blocked by dependent records (e.g. cancelling a bill that has payments). */
export class ConflictError extends LedgerError {
  readonly code = 'CONFLICT';
  readonly statusCode = 409;
}

/** A proxy split would take the parent's proxy totals past its own total. */
export class CapacityExceededError extends LedgerError {
  readonly code = 'CAPACITY_EXCEEDED';
  readonly statusCode = 409;
}

/** Storage contention or timeout. The whole operation may be retried by the caller. */
export class TransientError extends LedgerError {
  readonly code = 'TRANSIENT';
  readonly statusCode = 503;
  override readonly retryable = true;
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
