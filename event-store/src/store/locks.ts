import type { AppendOptions, LockKey } from '../types.js';
import { compileCanonicalKey } from '../query/compiler.js';

/**
 * Held shared by every append from just before its first INSERT until commit,
 * and exclusive by each stream read. A stream batch therefore never sees a
 * position while a lower one is still uncommitted.
 */
export const APPEND_BARRIER: LockKey = { key: 'events:append', mode: 'shared' };
export const READ_BARRIER: LockKey = { key: APPEND_BARRIER.key, mode: 'exclusive' };

/**
 * Locks to take for an append, in acquisition order.
 * Keys are deduplicated (exclusive wins over shared) and sorted so that two
 * writers needing overlapping keys always acquire them in the same order.
 */
export function resolveLocks(options: AppendOptions): LockKey[] {
  const requested = options.lockKeys ?? [{ key: compileCanonicalKey(options.query), mode: 'exclusive' }];
  const byKey = new Map<string, LockKey>();
  for (const lock of requested) {
    const existing = byKey.get(lock.key);
    if (existing === undefined || (existing.mode === 'shared' && lock.mode === 'exclusive')) {
      byKey.set(lock.key, { key: lock.key, mode: lock.mode });
    }
  }
  return [...byKey.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

export function lockStatement(lock: LockKey): string {
  return lock.mode === 'shared'
    ? 'SELECT pg_advisory_xact_lock_shared(hashtext($1))'
    : 'SELECT pg_advisory_xact_lock(hashtext($1))';
}
