import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { round2 } from '../../domain/decimal.js';
import { InvalidPolicyError, InvalidScoreError } from '../../domain/errors.js';

export const GradeBandSchema = z.object({
  grade: z.string().min(1),
  minPercentage: z.number().min(0).max(100),
  gradePoints: z.number().nonnegative(),
  description: z.string(),
});

export type GradeBand = Readonly<z.infer<typeof GradeBandSchema>>;

export interface CourseResult {
  credits: number;
  percentage: number;
}

export class GradingScale {
  /** Highest band first. */
  private constructor(private readonly bands: readonly GradeBand[]) {}

  static fromRows(rows: unknown): GradingScale {
    const parsed = z.array(GradeBandSchema).min(1).safeParse(rows);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidPolicyError(`Invalid grading scale: ${detail}`);
    }
    const bands = [...parsed.data].sort((a, b) => b.minPercentage - a.minPercentage);
    if (bands[bands.length - 1]?.minPercentage !== 0) {
      throw new InvalidPolicyError('Grading scale must have a band starting at 0');
    }
    for (let i = 1; i < bands.length; i++) {
      if (bands[i]?.minPercentage === bands[i - 1]?.minPercentage) {
        throw new InvalidPolicyError(`Grading scale has two bands starting at ${bands[i]?.minPercentage}`);
      }
    }
    return new GradingScale(bands.map((band) => Object.freeze({ ...band })));
  }

  gradeFor(percentage: number): GradeBand {
    if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
      throw new InvalidScoreError(`Percentage must be within [0, 100], got ${percentage}`);
    }
    const band = this.bands.find((b) => percentage >= b.minPercentage);
    if (band === undefined) {
      throw new InvalidScoreError(`No grade band covers ${percentage}`);
    }
    return band;
  }

  /** Credit-weighted grade point average, two decimals; 0 without credits. */
  computeGpa(results: readonly CourseResult[]): number {
    let credits = 0;
    let points = 0;
    for (const result of results) {
      if (!Number.isFinite(result.credits) || result.credits < 0) {
        throw new InvalidScoreError(`Credits must be a non-negative number, got ${result.credits}`);
      }
      credits += result.credits;
      points += result.credits * this.gradeFor(result.percentage).gradePoints;
    }
    return credits === 0 ? 0 : round2(points / credits);
  }
}

export async function loadGradingScale(path: string): Promise<GradingScale> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return GradingScale.fromRows(raw);
}
