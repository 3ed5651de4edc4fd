const DEFAULT_PRECISION = 2;

export function roundToPrecision(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * Power of two at the smallest absolute distance from `value`. Ties go to the larger one (48 becomes 64).
 */
export function nearestPowerOfTwo(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`Cannot round ${value} to a power of two`);
  }

  const lower = 2 ** Math.floor(Math.log2(value));
  const upper = lower * 2;

  return value - lower < upper - value ? lower : upper;
}
