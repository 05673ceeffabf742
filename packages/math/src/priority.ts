/**
 * priority.ts
 * Priority fee strategies for the gas adjuster. A strategy maps the recent base-fee window and the
 * configured default tip to a tip; callers clamp the result to [default, max acceptable].
 */

export interface PriorityFeeInput {
  /** base fees, oldest first */
  samples: readonly bigint[]
  defaultFee: bigint
}

export interface PriorityFeeStrategy {
  readonly name: string
  priorityFee(input: PriorityFeeInput): bigint
}

export function median(values: readonly bigint[]): bigint {
  if (values.length === 0) throw new RangeError('median of empty window')
  const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) return sorted[mid]
  return (sorted[mid - 1] + sorted[mid]) / 2n
}

/** Always the configured default. */
export class FixedPriorityFee implements PriorityFeeStrategy {
  readonly name = 'fixed'

  priorityFee(input: PriorityFeeInput): bigint {
    return input.defaultFee
  }
}

/**
 * Scales the default tip by latest / median base fee when the latest sample sits above the window median.
 * Monotonic in the latest sample; never below the default.
 */
export class BaseFeeRatioPriorityFee implements PriorityFeeStrategy {
  readonly name = 'base_fee_ratio'

  priorityFee(input: PriorityFeeInput): bigint {
    const { samples, defaultFee } = input
    if (samples.length === 0) return defaultFee
    const latest = samples[samples.length - 1]
    const mid = median(samples)
    if (mid <= 0n || latest <= mid) return defaultFee
    return (defaultFee * latest) / mid
  }
}

export const PRIORITY_FEE_STRATEGIES = {
  fixed: () => new FixedPriorityFee(),
  base_fee_ratio: () => new BaseFeeRatioPriorityFee(),
} as const

export type PriorityFeeStrategyName = keyof typeof PRIORITY_FEE_STRATEGIES
