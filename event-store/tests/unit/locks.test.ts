import { describe, it, expect } from 'vitest';
import { query } from '../../src/query/query-object.js';
import { compileCanonicalKey } from '../../src/query/compiler.js';
import { lockStatement, resolveLocks } from '../../src/store/locks.js';

describe('resolveLocks', () => {
  it('defaults to one exclusive lock on the canonical key of the query', () => {
    const q = query.eventsOfType('A').where({ id: '1' });
    expect(resolveLocks({ query: q, expectedVersion: 0n })).toEqual([
      { key: compileCanonicalKey(q), mode: 'exclusive' },
    ]);
  });

  it('sorts keys so overlapping writers acquire them in the same order', () => {
    const locks = resolveLocks({
      query: query.eventsOfType('A'),
      expectedVersion: 0n,
      lockKeys: [
        { key: 'student:s1', mode: 'shared' },
        { key: 'course:c1', mode: 'shared' },
        { key: 'pair:s1:c1', mode: 'exclusive' },
      ],
    });
    expect(locks.map((l) => l.key)).toEqual(['course:c1', 'pair:s1:c1', 'student:s1']);
  });

  it('keeps one entry per key and prefers exclusive', () => {
    const locks = resolveLocks({
      query: query.eventsOfType('A'),
      expectedVersion: 0n,
      lockKeys: [
        { key: 'course:c1', mode: 'shared' },
        { key: 'course:c1', mode: 'exclusive' },
        { key: 'course:c1', mode: 'shared' },
      ],
    });
    expect(locks).toEqual([{ key: 'course:c1', mode: 'exclusive' }]);
  });

  it('takes no locks for an empty lock list', () => {
    expect(resolveLocks({ query: query.eventsOfType('A'), expectedVersion: 0n, lockKeys: [] })).toEqual([]);
  });
});

describe('lockStatement', () => {
  it('uses the transaction-scoped advisory lock functions', () => {
    expect(lockStatement({ key: 'k', mode: 'exclusive' })).toBe('SELECT pg_advisory_xact_lock(hashtext($1))');
    expect(lockStatement({ key: 'k', mode: 'shared' })).toBe('SELECT pg_advisory_xact_lock_shared(hashtext($1))');
  });
});
