/**
 * threshold.ts
 * Percentage thresholds over absolute protocol ceilings; pure functions only.
 */

const PPM = 1_000_000n

/**
 * thresholdOf
 * floor(percentage * ceiling), with the percentage resolved to parts-per-million so the result is exact
 * for the decimal fractions operators write in config (0.95, 0.875, ...).
 */
export function thresholdOf(percentage: number, ceiling: bigint): bigint {
  if (!Number.isFinite(percentage) || percentage < 0) throw new RangeError(`invalid percentage ${percentage}`)
  const ppm = BigInt(Math.round(percentage * 1_000_000))
  return (ceiling * ppm) / PPM
}

/** True when `total + delta` would land strictly above `limit`. */
export function exceeds(total: bigint, delta: bigint, limit: bigint): boolean {
  return total + delta > limit
}

export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b <= 0n) throw new RangeError('divisor must be positive')
  return (a + b - 1n) / b
}

export function maxBig(...values: bigint[]): bigint {
  return values.reduce((acc, v) => (v > acc ? v : acc))
}

export function minBig(...values: bigint[]): bigint {
  return values.reduce((acc, v) => (v < acc ? v : acc))
}
