import { round2 } from '../../domain/decimal.js';
import type { SemesterPolicy } from './semester-policy.js';

export interface AdvancementInput {
  courseId: string;
  currentSemester: number;
  credits: number;
  gpa: number;
}

export interface AdvancementEvaluation {
  eligible: boolean;
  nextSemester: number;
  creditShortfall: number;
  gpaShortfall: number;
}

export function canAdvance(policy: SemesterPolicy, input: AdvancementInput): boolean {
  const rule = policy.ruleFor(input.courseId, input.currentSemester);
  return input.credits >= rule.minCredits && input.gpa >= rule.minGpa;
}

/** Same decision as canAdvance, with how far the student is from each minimum. */
export function evaluateAdvancement(policy: SemesterPolicy, input: AdvancementInput): AdvancementEvaluation {
  const rule = policy.ruleFor(input.courseId, input.currentSemester);
  return {
    eligible: canAdvance(policy, input),
    nextSemester: rule.nextSemester,
    creditShortfall: round2(Math.max(0, rule.minCredits - input.credits)),
    gpaShortfall: round2(Math.max(0, rule.minGpa - input.gpa)),
  };
}
