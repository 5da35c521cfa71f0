import { InvariantViolationError } from './errors.js';
import { round2 } from './decimal.js';

export type RefundPercentage = 90 | 50 | 25 | 0;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Refund tier for the elapsed share of a course. Bounds are inclusive on the
 * upper end: up to a quarter 90, up to half 50, up to three quarters 25.
 * Compared in integers so 45/180 lands exactly on the 90 tier.
 */
export function refundPercentageFor(completedDuration: number, totalCourseDuration: number): RefundPercentage {
  if (!Number.isInteger(totalCourseDuration) || totalCourseDuration <= 0) {
    throw new InvariantViolationError(`Course duration must be a positive whole number of days, got ${totalCourseDuration}`);
  }
  if (!Number.isInteger(completedDuration) || completedDuration < 0 || completedDuration > totalCourseDuration) {
    throw new InvariantViolationError(
      `Completed duration ${completedDuration} is outside [0, ${totalCourseDuration}]`,
    );
  }
  if (completedDuration * 4 <= totalCourseDuration) return 90;
  if (completedDuration * 2 <= totalCourseDuration) return 50;
  if (completedDuration * 4 <= totalCourseDuration * 3) return 25;
  return 0;
}

/** Whole days between enrollment and dropout, clamped to the course duration. */
export function completedDays(enrolledAt: Date, dropoutAt: Date, totalCourseDuration: number): number {
  const days = Math.floor((dropoutAt.getTime() - enrolledAt.getTime()) / MS_PER_DAY);
  return Math.min(totalCourseDuration, Math.max(0, days));
}

export interface RefundInput {
  enrolledAt: Date;
  dropoutAt: Date;
  totalCourseDuration: number;
  coursePrice: number;
}

export interface Refund {
  completedDuration: number;
  refundPercentage: RefundPercentage;
  refundAmount: number;
}

export function computeRefund(input: RefundInput): Refund {
  if (!Number.isFinite(input.coursePrice) || input.coursePrice < 0) {
    throw new InvariantViolationError(`Course price must be a non-negative amount, got ${input.coursePrice}`);
  }
  if (!Number.isInteger(input.totalCourseDuration) || input.totalCourseDuration <= 0) {
    throw new InvariantViolationError(
      `Course duration must be a positive whole number of days, got ${input.totalCourseDuration}`,
    );
  }
  const completedDuration = completedDays(input.enrolledAt, input.dropoutAt, input.totalCourseDuration);
  const refundPercentage = refundPercentageFor(completedDuration, input.totalCourseDuration);
  const refundAmount = round2((input.coursePrice * refundPercentage) / 100);
  if (!(refundAmount >= 0 && refundAmount <= input.coursePrice)) {
    throw new InvariantViolationError(`Refund ${refundAmount} is outside [0, ${input.coursePrice}]`);
  }
  return { completedDuration, refundPercentage, refundAmount };
}
