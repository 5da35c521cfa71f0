import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { CourseNotFoundError, NotEnrolledError } from '../../domain/errors.js';
import type { LifecycleEventOf } from '../../domain/events.js';
import { dropoutIdFor } from '../../domain/ids.js';
import { computeRefund } from '../../domain/refund.js';
import { reducePair } from '../../domain/reducers.js';
import type { DropoutRecord } from '../../domain/reducers.js';
import { pairBoundary, pairLocks } from '../../domain/streams.js';
import { enrollmentRemoval } from '../enrollments/enrollment-ledger.js';

export interface WithdrawInput {
  studentId: string;
  courseId: string;
  reason: string;
}

/**
 * Records the dropout with its refund and ends the enrollment in a single
 * append. The price comes from the same load that sets the expected version,
 * and the course lock is held shared, so a price change racing the withdrawal
 * makes one of them fail with ConcurrencyError.
 */
export async function withdrawStudent(
  store: LifecycleStore,
  clock: Clock,
  input: WithdrawInput,
): Promise<DropoutRecord> {
  const { studentId, courseId } = input;
  const boundary = pairBoundary(studentId, courseId);
  const { events, version } = await store.load(boundary);
  const state = reducePair(events);

  if (state.enrollment === null) {
    throw new NotEnrolledError(`Student '${studentId}' is not currently enrolled in course '${courseId}'`);
  }
  if (state.course.status !== 'listed') {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }

  const dropoutAt = clock.now();
  const refund = computeRefund({
    enrolledAt: new Date(state.enrollment.enrolledAt),
    dropoutAt,
    totalCourseDuration: state.course.durationDays,
    coursePrice: state.course.price,
  });

  const recorded: LifecycleEventOf<'DropoutRecorded'> = {
    type: 'DropoutRecorded',
    payload: {
      dropoutId: dropoutIdFor({
        studentId,
        courseId,
        enrollmentDate: state.enrollment.enrolledAt,
        dropoutDate: dropoutAt,
        ordinal: state.dropouts.length + 1,
      }),
      studentId,
      courseId,
      enrollmentDate: state.enrollment.enrolledAt,
      dropoutDate: dropoutAt.toISOString(),
      totalCourseDuration: state.course.durationDays,
      completedDuration: refund.completedDuration,
      coursePrice: state.course.price,
      refundPercentage: refund.refundPercentage,
      refundAmount: refund.refundAmount,
      reason: input.reason,
    },
  };

  await store.append([recorded, enrollmentRemoval(state.enrollment, dropoutAt)], {
    query: boundary,
    expectedVersion: version,
    lockKeys: pairLocks(studentId, courseId),
  });
  return recorded.payload;
}
