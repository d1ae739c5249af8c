// Absorbs floating-point noise such as 48.00000000001 / 24.
const RATIO_TOLERANCE = 1e-9;

/** Smallest whole number of `divisor` lengths that covers `value`. */
export function ceilDivide(value: number, divisor: number): number {
  return Math.ceil(value / divisor - RATIO_TOLERANCE);
}

/** Round a positive length up to the next multiple of `increment`. */
export function roundUpToIncrement(value: number, increment: number): number {
  if (value <= 0) return 0;
  return ceilDivide(value, increment) * increment;
}
