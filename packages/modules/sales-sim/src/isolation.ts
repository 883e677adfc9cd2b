import { getErrorCode, getErrorMessage } from '@salesim/shared';
import type { PersistFault, PersistFaultKind, PersistOutcome } from './types';

// SQLSTATEs that mean the table or column the generator writes to is not there
// (typically a migration that has not run yet).
const SCHEMA_MISMATCH_CODES = new Set(['42703', '42P01', '42804']);
const CONNECTION_CODES = new Set(['57P01', '57P02', '57P03', 'ECONNREFUSED', 'ECONNRESET']);

export function classifyPersistFault(err: unknown): PersistFault {
  const code = getErrorCode(err);
  const message = getErrorMessage(err);
  let kind: PersistFaultKind = 'unexpected';
  if (code) {
    if (SCHEMA_MISMATCH_CODES.has(code)) kind = 'schema_mismatch';
    else if (code.startsWith('23')) kind = 'constraint_violation';
    else if (code.startsWith('08') || CONNECTION_CODES.has(code)) kind = 'connection';
  }
  return code ? { kind, code, message } : { kind, message };
}

/**
 * Runs one unit of persistence work and reports how it went. A failure stays
 * inside the returned outcome; the caller decides whether to continue.
 */
export async function runIsolated<T>(work: () => Promise<T>): Promise<PersistOutcome<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (err) {
    return { ok: false, fault: classifyPersistFault(err) };
  }
}

export function emptyFaultCounts(): Record<PersistFaultKind, number> {
  return { schema_mismatch: 0, constraint_violation: 0, connection: 0, unexpected: 0 };
}
