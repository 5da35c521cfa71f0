import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import {
  AlreadyEnrolledError,
  CourseNotFoundError,
  StudentAccountClosedError,
} from '../../domain/errors.js';
import type { LifecycleEventOf } from '../../domain/events.js';
import { reducePair } from '../../domain/reducers.js';
import type { Enrollment } from '../../domain/reducers.js';
import { pairBoundary, pairLocks } from '../../domain/streams.js';

export type EnrollmentRef = Enrollment;

export interface PairInput {
  studentId: string;
  courseId: string;
}

export async function enrollStudent(
  store: LifecycleStore,
  clock: Clock,
  input: PairInput,
): Promise<EnrollmentRef> {
  const boundary = pairBoundary(input.studentId, input.courseId);
  const { events, version } = await store.load(boundary);
  const state = reducePair(events);

  if (state.course.status !== 'listed') {
    throw new CourseNotFoundError(`Course '${input.courseId}' not found`);
  }
  if (state.accountClosed) {
    throw new StudentAccountClosedError(`Student '${input.studentId}' has a closed account`);
  }
  if (state.enrollment !== null) {
    throw new AlreadyEnrolledError(
      `Student '${input.studentId}' is already enrolled in course '${input.courseId}'`,
    );
  }

  const enrollment: EnrollmentRef = {
    studentId: input.studentId,
    courseId: input.courseId,
    enrolledAt: clock.now().toISOString(),
  };
  await store.append([{ type: 'StudentEnrolled', payload: enrollment }], {
    query: boundary,
    expectedVersion: version,
    lockKeys: pairLocks(input.studentId, input.courseId),
  });
  return enrollment;
}

/** Active enrollment of the pair, or null. */
export async function lookupEnrollment(store: LifecycleStore, input: PairInput): Promise<Enrollment | null> {
  const { events } = await store.load(pairBoundary(input.studentId, input.courseId));
  return reducePair(events).enrollment;
}

/**
 * Event that ends an enrollment. Only the withdrawal processor appends it,
 * in the same batch as the dropout record, so there is no removal without
 * refund accounting.
 */
export function enrollmentRemoval(
  enrollment: Enrollment,
  unenrolledAt: Date,
): LifecycleEventOf<'StudentUnenrolled'> {
  return {
    type: 'StudentUnenrolled',
    payload: {
      studentId: enrollment.studentId,
      courseId: enrollment.courseId,
      unenrolledAt: unenrolledAt.toISOString(),
    },
  };
}
