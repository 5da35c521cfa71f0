import { queryFor } from 'lifecycle-event-store';
import type { LockKey } from 'lifecycle-event-store';
import type { LifecycleEventType } from './events.js';

export const lifecycleQuery = queryFor<LifecycleEventType>();

/** Course terms as the catalog publishes them. */
export function courseStream(courseId: string) {
  return lifecycleQuery
    .eventsOfType('CourseListed', 'CoursePriceChanged', 'CourseContentChanged', 'CourseDelisted')
    .where({ courseId });
}

/**
 * Everything recorded for one (student, course) pair, plus the catalog and
 * identity events that end its enrollment.
 */
export function pairStream(studentId: string, courseId: string) {
  return lifecycleQuery
    .eventsOfType(
      'StudentEnrolled',
      'LessonCompleted',
      'AssignmentSubmitted',
      'ProgressUpdated',
      'CertificateIssued',
      'DropoutRecorded',
      'StudentUnenrolled',
    )
    .where({ studentId, courseId })
    .eventsOfType('CourseDelisted').where({ courseId })
    .eventsOfType('StudentAccountClosed').where({ studentId });
}

/** Consistency boundary of every engine operation on a pair. */
export function pairBoundary(studentId: string, courseId: string) {
  return lifecycleQuery.union(pairStream(studentId, courseId), courseStream(courseId));
}

export function studentAccountStream(studentId: string) {
  return lifecycleQuery.eventsOfType('StudentAccountClosed').where({ studentId });
}

export function pairLocks(studentId: string, courseId: string): LockKey[] {
  return [
    { key: `pair:${studentId}:${courseId}`, mode: 'exclusive' },
    { key: `course:${courseId}`, mode: 'shared' },
    { key: `student:${studentId}`, mode: 'shared' },
  ];
}

export function courseLocks(courseId: string): LockKey[] {
  return [{ key: `course:${courseId}`, mode: 'exclusive' }];
}

export function studentLocks(studentId: string): LockKey[] {
  return [{ key: `student:${studentId}`, mode: 'exclusive' }];
}
