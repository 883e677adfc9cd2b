import { monotonicFactory, ulid } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;
const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const monotonic = monotonicFactory();

export function generateUlid(): string {
  return monotonic();
}

/**
 * ULID whose timestamp component is `at` instead of wall-clock time. Used for
 * records that belong to a simulated instant so their ids sort along the
 * simulated timeline rather than along the run that produced them.
 */
export function generateUlidAt(at: Date): string {
  return ulid(at.getTime());
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}

/** Decodes the 48-bit millisecond timestamp from the first 10 characters. */
export function ulidTimestamp(value: string): number {
  if (!isValidUlid(value)) {
    throw new TypeError(`Invalid ULID: ${value}`);
  }
  let time = 0;
  for (const char of value.slice(0, 10)) {
    time = time * 32 + CROCKFORD.indexOf(char);
  }
  return time;
}
