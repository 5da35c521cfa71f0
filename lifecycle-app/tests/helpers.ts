import { InMemoryEventStore } from 'lifecycle-event-store/testing';
import type { NewEvent } from 'lifecycle-event-store';
import { LifecycleEventSchema } from '../src/domain/events.js';
import type { LifecycleEvent, LifecycleEventType } from '../src/domain/events.js';
import { manualClock } from '../src/domain/clock.js';
import type { ManualClock } from '../src/domain/clock.js';
import { listCourse } from '../src/features/catalog/course-terms.js';
import type { ListCourseInput } from '../src/features/catalog/course-terms.js';

/** Monday morning, start of term. */
export const TERM_START = new Date('2025-01-06T09:00:00.000Z');

export function newStore(
  beforeInsert?: (event: NewEvent<LifecycleEvent>, indexInBatch: number) => void,
): InMemoryEventStore<LifecycleEvent> {
  return new InMemoryEventStore<LifecycleEvent>({
    codec: LifecycleEventSchema,
    ...(beforeInsert !== undefined ? { beforeInsert } : {}),
  });
}

export function newClock(start: Date = TERM_START): ManualClock {
  return manualClock(start);
}

export async function seedCourse(
  store: InMemoryEventStore<LifecycleEvent>,
  clock: ManualClock,
  overrides: Partial<ListCourseInput> = {},
) {
  return listCourse(store, clock, {
    courseId: 'c1',
    title: 'Distributed Systems',
    price: 1000,
    durationDays: 180,
    totalLessons: 10,
    totalAssignments: 0,
    ...overrides,
  });
}

export function typesOf(store: InMemoryEventStore<LifecycleEvent>): LifecycleEventType[] {
  return store.events.map((event) => event.type);
}

export function countOf(store: InMemoryEventStore<LifecycleEvent>, type: LifecycleEventType): number {
  return store.events.filter((event) => event.type === type).length;
}

/** Rejection reason of a settled promise, or undefined when it fulfilled. */
export function reasonOf(result: PromiseSettledResult<unknown> | undefined): unknown {
  return result?.status === 'rejected' ? result.reason : undefined;
}
