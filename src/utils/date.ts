export function isoNow(): string {
  return new Date().toISOString();
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isValidDateOnly(value: string): boolean {
  const m = DATE_ONLY.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const dt = new Date(Date.UTC(y, mo - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === mo - 1 && dt.getUTCDate() === d;
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/**
 * Normalizes a `date` column to YYYY-MM-DD.
 * pg parses DATE into a local-midnight Date, sqlite hands back the stored text.
 */
export function toDateOnly(value: string | Date | number): string {
  if (typeof value === 'string') return value.slice(0, 10);
  if (typeof value === 'number') return new Date(value).toISOString().slice(0, 10);
  return `${value.getFullYear()}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;
}

export function toTimestamp(value: string | Date | number): Date;
export function toTimestamp(value: string | Date | number | null): Date | null;
export function toTimestamp(value: string | Date | number | null): Date | null {
  if (value === null) return null;
  if (value instanceof Date) return value;
  return new Date(value);
}

export function todayDateOnly(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
