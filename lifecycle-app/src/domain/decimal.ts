/** Rounds half away from zero to two decimal places, as a DECIMAL(p,2) column stores it. */
export function round2(value: number): number {
  return Math.sign(value) * (Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100);
}
