import { computeMaxFee, minReplacementValue, replacementFees } from '../src/fee'

describe('fee bigint math', () => {
  it('computeMaxFee doubles the base fee and adds the tip, clamping negatives', () => {
    expect(computeMaxFee(10n, 3n)).toBe(23n)
    expect(computeMaxFee(-5n, 3n)).toBe(3n)
  })

  const table: Array<{ previous: bigint; next: bigint }> = [
    { previous: 1000n, next: 1125n },
    { previous: 100n, next: 113n }, // 112.5 rounds up
    { previous: 1n, next: 2n },
    { previous: 0n, next: 1n }, // +1 wei floor
  ]

  it('minReplacementValue raises by 12.5% rounded up and at least 1 wei', () => {
    for (const row of table) {
      expect(minReplacementValue(row.previous)).toBe(row.next)
    }
  })

  it('replacementFees never goes below the bumped previous fees', () => {
    const fees = replacementFees({ maxFeePerGas: 1000n, maxPriorityFeePerGas: 100n }, { maxFeePerGas: 900n, maxPriorityFeePerGas: 90n })
    expect(fees).toEqual({ maxFeePerGas: 1125n, maxPriorityFeePerGas: 113n })
  })

  it('replacementFees keeps higher proposed fees', () => {
    const fees = replacementFees({ maxFeePerGas: 1000n, maxPriorityFeePerGas: 100n }, { maxFeePerGas: 2000n, maxPriorityFeePerGas: 500n })
    expect(fees).toEqual({ maxFeePerGas: 2000n, maxPriorityFeePerGas: 500n })
  })

  it('replacementFees is strictly increasing across repeated bumps', () => {
    let fees = { maxFeePerGas: 10n, maxPriorityFeePerGas: 1n }
    for (let i = 0; i < 5; i++) {
      const next = replacementFees(fees, fees)
      expect(next.maxFeePerGas > fees.maxFeePerGas).toBe(true)
      expect(next.maxPriorityFeePerGas > fees.maxPriorityFeePerGas).toBe(true)
      expect(next.maxFeePerGas >= next.maxPriorityFeePerGas).toBe(true)
      fees = next
    }
  })
})
