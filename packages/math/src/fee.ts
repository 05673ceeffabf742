/**
 * fee.ts
 * EIP-1559 fee helpers for base-chain submissions; pure functions only (no I/O, no side-effects).
 */
import { ceilDiv, maxBig } from './threshold'

export const GWEI = 1_000_000_000n

/** Replacement transactions must raise every fee component by at least this ratio (geth's 10%, with headroom). */
export const REPLACEMENT_BUMP_NUMERATOR = 1125n
export const REPLACEMENT_BUMP_DENOMINATOR = 1000n

export type Eip1559Fees = {
  maxFeePerGas: bigint
  maxPriorityFeePerGas: bigint
}

/**
 * computeMaxFee
 * maxFeePerGas covers two consecutive full blocks of base-fee growth plus the tip.
 */
export function computeMaxFee(baseFee: bigint, priorityFee: bigint): bigint {
  const b = baseFee < 0n ? 0n : baseFee
  const p = priorityFee < 0n ? 0n : priorityFee
  return b * 2n + p
}

/** Smallest value a replacement may use: +12.5% rounded up, and at least +1 wei. */
export function minReplacementValue(previous: bigint): bigint {
  const bumped = ceilDiv(previous * REPLACEMENT_BUMP_NUMERATOR, REPLACEMENT_BUMP_DENOMINATOR)
  return bumped > previous ? bumped : previous + 1n
}

/**
 * replacementFees
 * Combine freshly proposed fees with the fees of the transaction being replaced.
 * Every component ends strictly above the previous one; maxFee never drops below the tip.
 */
export function replacementFees(previous: Eip1559Fees, proposed: Eip1559Fees): Eip1559Fees {
  const maxPriorityFeePerGas = maxBig(proposed.maxPriorityFeePerGas, minReplacementValue(previous.maxPriorityFeePerGas))
  const maxFeePerGas = maxBig(proposed.maxFeePerGas, minReplacementValue(previous.maxFeePerGas), maxPriorityFeePerGas)
  return { maxFeePerGas, maxPriorityFeePerGas }
}
