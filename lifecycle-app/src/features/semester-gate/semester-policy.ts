import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidPolicyError, NoPolicyDefinedError } from '../../domain/errors.js';

export const SemesterRuleSchema = z.object({
  courseId: z.string().min(1),
  currentSemester: z.number().int().positive(),
  nextSemester: z.number().int().positive(),
  minCredits: z.number().nonnegative(),
  minGpa: z.number().nonnegative(),
});

export type SemesterRule = Readonly<z.infer<typeof SemesterRuleSchema>>;

function ruleKey(courseId: string, currentSemester: number): string {
  return `${courseId}#${currentSemester}`;
}

/**
 * Immutable advancement policy: (course, current semester) to the next
 * semester and its credit and GPA minimums. Built once at startup and passed
 * to whoever needs it.
 */
export class SemesterPolicy {
  private constructor(private readonly byKey: ReadonlyMap<string, SemesterRule>) {}

  static fromRows(rows: unknown): SemesterPolicy {
    const parsed = z.array(SemesterRuleSchema).safeParse(rows);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidPolicyError(`Invalid semester policy: ${detail}`);
    }

    const byKey = new Map<string, SemesterRule>();
    for (const rule of parsed.data) {
      if (rule.nextSemester <= rule.currentSemester) {
        throw new InvalidPolicyError(
          `Course '${rule.courseId}' semester ${rule.currentSemester} must advance to a later semester, got ${rule.nextSemester}`,
        );
      }
      const key = ruleKey(rule.courseId, rule.currentSemester);
      if (byKey.has(key)) {
        throw new InvalidPolicyError(
          `Duplicate rule for course '${rule.courseId}' semester ${rule.currentSemester}`,
        );
      }
      byKey.set(key, Object.freeze({ ...rule }));
    }
    return new SemesterPolicy(byKey);
  }

  get rules(): SemesterRule[] {
    return [...this.byKey.values()];
  }

  /** The matching rule; NoPolicyDefinedError when there is none. */
  ruleFor(courseId: string, currentSemester: number): SemesterRule {
    const rule = this.byKey.get(ruleKey(courseId, currentSemester));
    if (rule === undefined) {
      throw new NoPolicyDefinedError(
        `No advancement policy for course '${courseId}' semester ${currentSemester}`,
      );
    }
    return rule;
  }
}

export async function loadSemesterPolicy(path: string): Promise<SemesterPolicy> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return SemesterPolicy.fromRows(raw);
}
