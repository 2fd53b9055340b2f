const TINY = 3e-324;

// Rounds half to even, using the default rounding of denormal arithmetic.
export function roundToNearestEven(number: number): number {
  return number * TINY / TINY;
}

const RELATIVE_EPSILON = 1e-6;
const ABSOLUTE_EPSILON = 1e-9;

// Single precision values are widened to double, so comparisons allow for
// the rounding error of that round trip.
export function floatEqual(a: number, b: number): boolean {
  if (a === b) {
    return true;
  }
  const tolerance = Math.max(ABSOLUTE_EPSILON, Math.max(Math.abs(a), Math.abs(b)) * RELATIVE_EPSILON);
  return Math.abs(a - b) <= tolerance;
}
