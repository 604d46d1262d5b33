// Checked integer arithmetic. Doubles are exact below 2^53 and rounding is
// monotone, so an out-of-range exact result never rounds back into range and
// comparing the computed double against the bounds is exact.

import type { IntegerBounds } from './constants';

export function isRepresentable(x: number, bounds: IntegerBounds): boolean {
  return Number.isInteger(x) && x >= bounds.min && x <= bounds.max;
}

/** `x` with -0 folded to 0, or null when `x` is outside the bounds. */
export function inRange(x: number, bounds: IntegerBounds): number | null {
  if (!(x >= bounds.min && x <= bounds.max)) return null;
  return x === 0 ? 0 : x;
}
