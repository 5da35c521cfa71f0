import type { LifecycleStore } from '../../store.js';
import type { DropoutRecord } from '../../domain/reducers.js';
import { lifecycleQuery } from '../../domain/streams.js';

// Private to this slice
function courseDropoutStream(courseId: string) {
  return lifecycleQuery.eventsOfType('DropoutRecorded').where({ courseId });
}

/** Dropout records of a course in the order they were written; the refund liabilities. */
export async function listDropouts(store: LifecycleStore, input: { courseId: string }): Promise<DropoutRecord[]> {
  const { events } = await store.load(courseDropoutStream(input.courseId));
  const records: DropoutRecord[] = [];
  for (const event of events) {
    if (event.type === 'DropoutRecorded') records.push(event.payload);
  }
  return records;
}
