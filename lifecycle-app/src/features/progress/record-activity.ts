import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { CourseNotFoundError, NotEnrolledError } from '../../domain/errors.js';
import type { LifecycleEvent, LifecycleEventOf } from '../../domain/events.js';
import { computePercentage } from '../../domain/progress.js';
import type { ProgressRecord } from '../../domain/progress.js';
import { reducePair } from '../../domain/reducers.js';
import type { Certificate, PairState } from '../../domain/reducers.js';
import { pairBoundary, pairLocks } from '../../domain/streams.js';
import { onProgressChanged } from '../certificates/certificate-issuer.js';

export interface ProgressOutcome {
  /**
   * After a repeated activity this is the last stored record, not one
   * recomputed against the current course totals; it refreshes with the
   * next new activity.
   */
  progress: ProgressRecord;
  /** Completion certificate issued by this call, if any. */
  certificate: Certificate | null;
}

type Activity =
  | { kind: 'lesson'; lessonId: string }
  | { kind: 'assignment'; assignmentId: string };

function alreadyRecorded(state: PairState, activity: Activity): boolean {
  return activity.kind === 'lesson'
    ? state.completedLessons.has(activity.lessonId)
    : state.submittedAssignments.has(activity.assignmentId);
}

function activityEvent(
  studentId: string,
  courseId: string,
  activity: Activity,
  at: string,
): LifecycleEventOf<'LessonCompleted' | 'AssignmentSubmitted'> {
  return activity.kind === 'lesson'
    ? { type: 'LessonCompleted', payload: { studentId, courseId, lessonId: activity.lessonId, completedAt: at } }
    : {
      type: 'AssignmentSubmitted',
      payload: { studentId, courseId, assignmentId: activity.assignmentId, submittedAt: at },
    };
}

async function recordActivity(
  store: LifecycleStore,
  clock: Clock,
  studentId: string,
  courseId: string,
  activity: Activity,
): Promise<ProgressOutcome> {
  const boundary = pairBoundary(studentId, courseId);
  const { events, version } = await store.load(boundary);
  const state = reducePair(events);

  if (state.enrollment === null) {
    throw new NotEnrolledError(`Student '${studentId}' is not currently enrolled in course '${courseId}'`);
  }
  if (state.course.status !== 'listed') {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }

  const now = clock.now();
  const counts = {
    totalLessons: state.course.totalLessons,
    completedLessons: state.completedLessons.size,
    totalAssignments: state.course.totalAssignments,
    submittedAssignments: state.submittedAssignments.size,
  };

  if (alreadyRecorded(state, activity)) {
    return {
      progress: state.progress ?? {
        studentId,
        courseId,
        ...counts,
        percentage: computePercentage(counts),
        lastUpdated: now.toISOString(),
      },
      certificate: null,
    };
  }

  if (activity.kind === 'lesson') counts.completedLessons += 1;
  else counts.submittedAssignments += 1;

  const previousPercentage = state.progress?.percentage ?? 0;
  const percentage = computePercentage(counts);
  const progress: ProgressRecord = {
    studentId,
    courseId,
    ...counts,
    percentage,
    lastUpdated: now.toISOString(),
  };

  const issued = onProgressChanged(
    { studentId, courseId, previousPercentage, percentage },
    { certificates: state.certificates, issuedAt: now },
  );

  const batch: LifecycleEvent[] = [
    activityEvent(studentId, courseId, activity, now.toISOString()),
    {
      type: 'ProgressUpdated',
      payload: { studentId, courseId, ...counts, previousPercentage, percentage, updatedAt: now.toISOString() },
    },
  ];
  if (issued !== null) batch.push(issued);

  await store.append(batch, {
    query: boundary,
    expectedVersion: version,
    lockKeys: pairLocks(studentId, courseId),
  });

  return { progress, certificate: issued?.payload ?? null };
}

/**
 * Marks a lesson done for an enrolled student. Repeating a lesson appends
 * nothing and returns the last stored progress record as it was written.
 */
export function recordLessonCompletion(
  store: LifecycleStore,
  clock: Clock,
  input: { studentId: string; courseId: string; lessonId: string },
): Promise<ProgressOutcome> {
  return recordActivity(store, clock, input.studentId, input.courseId, { kind: 'lesson', lessonId: input.lessonId });
}

export function recordAssignmentSubmission(
  store: LifecycleStore,
  clock: Clock,
  input: { studentId: string; courseId: string; assignmentId: string },
): Promise<ProgressOutcome> {
  return recordActivity(store, clock, input.studentId, input.courseId, {
    kind: 'assignment',
    assignmentId: input.assignmentId,
  });
}
