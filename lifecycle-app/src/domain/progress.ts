import { InvariantViolationError } from './errors.js';
import { round2 } from './decimal.js';

/** Percentage at or above which a course counts as completed. */
export const COMPLETION_THRESHOLD = 90;

export interface ProgressCounts {
  totalLessons: number;
  completedLessons: number;
  totalAssignments: number;
  submittedAssignments: number;
}

export interface ProgressRecord extends ProgressCounts {
  studentId: string;
  courseId: string;
  percentage: number;
  lastUpdated: string;
}

function assertCount(name: keyof ProgressCounts, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvariantViolationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Completion percentage of a pair: 0 when the course has no lessons or
 * assignments, otherwise done/total * 100 rounded to two decimals and
 * clamped to [0, 100].
 */
export function computePercentage(counts: ProgressCounts): number {
  assertCount('totalLessons', counts.totalLessons);
  assertCount('completedLessons', counts.completedLessons);
  assertCount('totalAssignments', counts.totalAssignments);
  assertCount('submittedAssignments', counts.submittedAssignments);

  const total = counts.totalLessons + counts.totalAssignments;
  if (total === 0) return 0;

  const raw = ((counts.completedLessons + counts.submittedAssignments) * 100) / total;
  if (!Number.isFinite(raw)) {
    throw new InvariantViolationError(`Percentage is not a finite number (${raw})`);
  }
  return Math.min(100, Math.max(0, round2(raw)));
}

export function crossedCompletion(previousPercentage: number, percentage: number): boolean {
  return previousPercentage < COMPLETION_THRESHOLD && percentage >= COMPLETION_THRESHOLD;
}
