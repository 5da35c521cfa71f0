import type { LifecycleStore } from '../../store.js';
import type { ProgressRecord } from '../../domain/progress.js';
import { reducePair } from '../../domain/reducers.js';
import { pairStream } from '../../domain/streams.js';

export async function getProgress(
  store: LifecycleStore,
  input: { studentId: string; courseId: string },
): Promise<ProgressRecord | null> {
  const { events } = await store.load(pairStream(input.studentId, input.courseId));
  return reducePair(events).progress;
}
