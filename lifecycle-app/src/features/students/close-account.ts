import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { studentAccountStream, studentLocks } from '../../domain/streams.js';

/**
 * Identity hook: the student's account is gone, so every enrollment they hold
 * ends. Closing an already closed account changes nothing.
 *
 * @returns whether this call closed the account
 */
export async function closeStudentAccount(
  store: LifecycleStore,
  clock: Clock,
  input: { studentId: string },
): Promise<boolean> {
  const boundary = studentAccountStream(input.studentId);
  const { events, version } = await store.load(boundary);
  if (events.length > 0) return false;

  await store.append(
    [{ type: 'StudentAccountClosed', payload: { studentId: input.studentId, closedAt: clock.now().toISOString() } }],
    { query: boundary, expectedVersion: version, lockKeys: studentLocks(input.studentId) },
  );
  return true;
}
