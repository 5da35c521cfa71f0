import { describe, it, expect } from 'vitest';
import { ConcurrencyError, EventStoreError, withConcurrencyRetry } from 'lifecycle-event-store';
import { withdrawStudent } from '../withdraw-student.js';
import { listDropouts } from '../list-dropouts.js';
import { enrollStudent, lookupEnrollment } from '../../enrollments/enrollment-ledger.js';
import { recordLessonCompletion } from '../../progress/record-activity.js';
import { changeCoursePrice } from '../../catalog/course-terms.js';
import { getProgress } from '../../progress/get-progress.js';
import { InvariantViolationError, NotEnrolledError } from '../../../domain/errors.js';
import { dropoutIdFor } from '../../../domain/ids.js';
import type { LifecycleStore } from '../../../store.js';
import { TERM_START, countOf, newClock, newStore, seedCourse, typesOf } from '../../../../tests/helpers.js';

const pair = { studentId: 's1', courseId: 'c1' };

async function enrolledStore(beforeInsert?: Parameters<typeof newStore>[0]) {
  const store = newStore(beforeInsert);
  const clock = newClock();
  await seedCourse(store, clock);
  await enrollStudent(store, clock, pair);
  return { store, clock };
}

describe('withdrawStudent', () => {
  it('records the refund and ends the enrollment in one batch', async () => {
    const { store, clock } = await enrolledStore();
    for (let i = 1; i <= 9; i++) {
      await recordLessonCompletion(store, clock, { ...pair, lessonId: `l${i}` });
    }
    clock.advanceDays(40);
    const before = store.events.length;

    const record = await withdrawStudent(store, clock, { ...pair, reason: 'personal' });

    const dropoutAt = new Date(TERM_START.getTime() + 40 * 24 * 60 * 60 * 1000);
    expect(record).toEqual({
      dropoutId: dropoutIdFor({
        studentId: 's1',
        courseId: 'c1',
        enrollmentDate: '2025-01-06T09:00:00.000Z',
        dropoutDate: dropoutAt,
        ordinal: 1,
      }),
      studentId: 's1',
      courseId: 'c1',
      enrollmentDate: '2025-01-06T09:00:00.000Z',
      dropoutDate: '2025-02-15T09:00:00.000Z',
      totalCourseDuration: 180,
      completedDuration: 40,
      coursePrice: 1000,
      refundPercentage: 90,
      refundAmount: 900,
      reason: 'personal',
    });
    expect(typesOf(store).slice(before)).toEqual(['DropoutRecorded', 'StudentUnenrolled']);
    expect(await lookupEnrollment(store, pair)).toBeNull();
    expect(await listDropouts(store, { courseId: 'c1' })).toEqual([record]);
    expect(countOf(store, 'CertificateIssued')).toBe(1);
    expect((await getProgress(store, pair))?.percentage).toBe(90);
  });

  it.each([
    [30, 90, 900],
    [60, 50, 500],
    [100, 25, 250],
    [170, 0, 0],
    [400, 0, 0],
  ])('after %i days refunds %i%% (%i)', async (days, refundPercentage, refundAmount) => {
    const { store, clock } = await enrolledStore();
    clock.advanceDays(days);
    const record = await withdrawStudent(store, clock, { ...pair, reason: '' });
    expect(record).toMatchObject({ completedDuration: Math.min(days, 180), refundPercentage, refundAmount });
  });

  it('gives each withdrawal of a pair its own dropout id', async () => {
    const { store, clock } = await enrolledStore();
    await withdrawStudent(store, clock, { ...pair, reason: '' });
    await enrollStudent(store, clock, pair);
    await withdrawStudent(store, clock, { ...pair, reason: '' });

    const ids = (await listDropouts(store, { courseId: 'c1' })).map((record) => record.dropoutId);
    expect(ids).toHaveLength(2);
    expect(new Set(ids).size).toBe(2);
  });

  it('rejects a pair without an active enrollment', async () => {
    const store = newStore();
    const clock = newClock();
    await seedCourse(store, clock);
    await expect(withdrawStudent(store, clock, { ...pair, reason: '' })).rejects.toThrow(NotEnrolledError);
  });

  it('rejects a second withdrawal', async () => {
    const { store, clock } = await enrolledStore();
    await withdrawStudent(store, clock, { ...pair, reason: '' });
    await expect(withdrawStudent(store, clock, { ...pair, reason: '' })).rejects.toThrow(
      "Student 's1' is not currently enrolled in course 'c1'",
    );
    expect(countOf(store, 'DropoutRecorded')).toBe(1);
  });

  it('writes nothing when the enrollment removal fails', async () => {
    const { store, clock } = await enrolledStore((event) => {
      if (event.type === 'StudentUnenrolled') throw new Error('disk full');
    });

    await expect(withdrawStudent(store, clock, { ...pair, reason: '' })).rejects.toThrow(EventStoreError);
    expect(countOf(store, 'DropoutRecorded')).toBe(0);
    expect(await lookupEnrollment(store, pair)).not.toBeNull();
  });

  it('refunds at the price in force when a price change races the withdrawal', async () => {
    const { store, clock } = await enrolledStore();
    clock.advanceDays(40);
    let raced = false;
    const racing: LifecycleStore = {
      async load(query) {
        const result = await store.load(query);
        if (!raced) {
          raced = true;
          await changeCoursePrice(store, clock, { courseId: 'c1', price: 2000 });
        }
        return result;
      },
      append: (events, options) => store.append(events, options),
      stream: (query, options) => store.stream(query, options),
      initializeSchema: () => store.initializeSchema(),
      close: () => store.close(),
    };

    await expect(withdrawStudent(racing, clock, { ...pair, reason: '' })).rejects.toThrow(ConcurrencyError);
    const record = await withConcurrencyRetry(() => withdrawStudent(racing, clock, { ...pair, reason: '' }));

    expect(record).toMatchObject({ coursePrice: 2000, refundPercentage: 90, refundAmount: 1800 });
    expect(countOf(store, 'DropoutRecorded')).toBe(1);
  });

  it('refuses to record a refund from corrupt course terms', async () => {
    const store = newStore();
    const clock = newClock();
    await store.append({
      type: 'CourseListed',
      payload: {
        courseId: 'c1',
        title: 'Broken',
        price: -5,
        durationDays: 180,
        totalLessons: 10,
        totalAssignments: 0,
        listedAt: TERM_START.toISOString(),
      },
    });
    await enrollStudent(store, clock, pair);

    await expect(withdrawStudent(store, clock, { ...pair, reason: '' })).rejects.toThrow(InvariantViolationError);
    expect(countOf(store, 'DropoutRecorded')).toBe(0);
    expect(await lookupEnrollment(store, pair)).not.toBeNull();
  });

  it('leaves other enrollments of the course alone', async () => {
    const { store, clock } = await enrolledStore();
    await enrollStudent(store, clock, { studentId: 's2', courseId: 'c1' });

    await withdrawStudent(store, clock, { ...pair, reason: '' });

    expect(await lookupEnrollment(store, { studentId: 's2', courseId: 'c1' })).not.toBeNull();
    expect(await listDropouts(store, { courseId: 'c1' })).toHaveLength(1);
    expect(await listDropouts(store, { courseId: 'c2' })).toEqual([]);
  });
});
