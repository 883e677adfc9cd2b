import { describe, it, expect } from 'vitest';
import { classifyPersistFault, emptyFaultCounts, runIsolated } from '../isolation';
import { pgError } from './memory-store';

describe('classifyPersistFault', () => {
  it.each([
    ['42703', 'schema_mismatch'],
    ['42P01', 'schema_mismatch'],
    ['42804', 'schema_mismatch'],
    ['23505', 'constraint_violation'],
    ['23503', 'constraint_violation'],
    ['08006', 'connection'],
    ['57P01', 'connection'],
    ['ECONNREFUSED', 'connection'],
    ['40001', 'unexpected'],
  ])('classifies %s as %s', (code, kind) => {
    expect(classifyPersistFault(pgError(code, 'failed'))).toEqual({ kind, code, message: 'failed' });
  });

  it('treats errors without a code as unexpected', () => {
    expect(classifyPersistFault(new Error('boom'))).toEqual({ kind: 'unexpected', message: 'boom' });
    expect(classifyPersistFault('plain string')).toEqual({ kind: 'unexpected', message: 'plain string' });
  });
});

describe('runIsolated', () => {
  it('wraps a successful value', async () => {
    await expect(runIsolated(async () => 42)).resolves.toEqual({ ok: true, value: 42 });
  });

  it('captures a rejection as a fault', async () => {
    const outcome = await runIsolated(async () => {
      throw pgError('23505', 'duplicate key');
    });
    expect(outcome).toEqual({
      ok: false,
      fault: { kind: 'constraint_violation', code: '23505', message: 'duplicate key' },
    });
  });
});

describe('emptyFaultCounts', () => {
  it('starts every kind at zero', () => {
    expect(emptyFaultCounts()).toEqual({
      schema_mismatch: 0,
      constraint_violation: 0,
      connection: 0,
      unexpected: 0,
    });
  });
});
