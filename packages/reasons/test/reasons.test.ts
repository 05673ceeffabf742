import { ResourceDimension } from '@sealkeeper/dto'
import { REASONS } from '../src/registry'
import { reason } from '../src/factory'
import { ConfigurationError, PipelineError, SealingInvariantViolation, TransactionRejected } from '../src/errors'
import { shouldRetry } from '../src/retry'

describe('reasons factory', () => {
  test('factory-defaults: exact match for canonical codes', () => {
    const r = reason('REJECT_GAS_LIMIT')
    expect(r).toEqual(REASONS.REJECT_GAS_LIMIT)
  })

  test('override-context: merges new message and context', () => {
    const r = reason('REJECT_GEOMETRY', { message: 'custom', context: { threshold: 1, projected: 2 } })
    expect(r.message).toBe('custom')
    expect(r.context).toEqual({ threshold: 1, projected: 2 })
    expect(r.category).toBe(REASONS.REJECT_GEOMETRY.category)
  })
})

describe('error classes', () => {
  test('TransactionRejected carries code, tx hash and dimension', () => {
    const err = new TransactionRejected(reason('REJECT_PUBDATA'), '0xabc', ResourceDimension.PUBDATA)
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(PipelineError)
    expect(err.code).toBe('REJECT_PUBDATA')
    expect(err.txHash).toBe('0xabc')
    expect(err.dimension).toBe(ResourceDimension.PUBDATA)
    expect(err.name).toBe('TransactionRejected')
  })

  test('SealingInvariantViolation is terminal', () => {
    const err = new SealingInvariantViolation(reason('SEAL_HALTED'))
    expect(err.terminal).toBe(true)
    expect(err.reason.recoverable).toBe(false)
    expect(err.message).toBe('Admission halted until the pending sealed batch is persisted')
  })

  test('ConfigurationError joins issues into the message', () => {
    const err = new ConfigurationError(reason('CONFIG_INVALID'), ['a: bad', 'b: worse'])
    expect(err.message).toBe('Invalid configuration: a: bad; b: worse')
    expect(err.issues).toEqual(['a: bad', 'b: worse'])
  })
})

describe('shouldRetry policy table', () => {
  const table: Array<{ code: keyof typeof REASONS; expect: boolean }> = [
    { code: 'NETWORK_RPC_UNAVAILABLE', expect: true },
    { code: 'PROOF_UNAVAILABLE', expect: true },
    { code: 'AGGREGATION_OVERFLOW', expect: true },
    { code: 'REJECT_GAS_LIMIT', expect: false },
    { code: 'SUBMIT_REVERTED', expect: false },
    { code: 'SEAL_PERSIST_FAILED', expect: false },
    { code: 'INTERNAL_ERROR', expect: false },
  ]
  for (const row of table) {
    it(`${row.code} -> ${row.expect}`, () => {
      expect(shouldRetry(row.code)).toBe(row.expect)
    })
  }
})
