import { BundleKind } from '@sealkeeper/dto'
import { BundleEncoder, CALLDATA_HEADER_SIZE } from '../../src/services/BundleEncoder'
import { sealedBatch } from '../helpers/fixtures'

describe('BundleEncoder', () => {
  const real = new BundleEncoder(true)
  const skip = new BundleEncoder(false)
  const batches = [sealedBatch(10), sealedBatch(11), sealedBatch(12)]

  test('commit calldata is the header plus five words per batch', () => {
    const payload = real.encode(BundleKind.COMMIT, batches)
    expect(BundleEncoder.payloadSize(payload)).toBe(CALLDATA_HEADER_SIZE + 3 * 160)
    expect(BundleEncoder.payloadSize(payload)).toBe(CALLDATA_HEADER_SIZE + 3 * real.batchSize(BundleKind.COMMIT))
    expect(BundleEncoder.decode(payload)).toEqual({ name: 'commitBatches', firstBatch: 10, lastBatch: 12 })
  })

  test('execute calldata is the header plus two words per batch', () => {
    const payload = real.encode(BundleKind.EXECUTE, batches.slice(0, 2))
    expect(BundleEncoder.payloadSize(payload)).toBe(260)
    expect(BundleEncoder.decode(payload).name).toBe('executeBatches')
  })

  test('prove calldata size accounts for padded proof bodies', () => {
    const empty = real.encode(BundleKind.PROVE, batches.slice(0, 2))
    expect(BundleEncoder.payloadSize(empty)).toBe(CALLDATA_HEADER_SIZE + 2 * real.batchSize(BundleKind.PROVE, 0))

    const proof = '0x' + 'ab'.repeat(40)
    const withProofs = real.encode(BundleKind.PROVE, batches.slice(0, 2), [proof, proof])
    expect(real.batchSize(BundleKind.PROVE, 40)).toBe(128)
    expect(BundleEncoder.payloadSize(withProofs)).toBe(CALLDATA_HEADER_SIZE + 2 * 128)
  })

  test('gas estimates follow the per-kind formulas', () => {
    const two = [sealedBatch(1, 100n), sealedBatch(2, 100n)]
    expect(real.estimateGas(BundleKind.COMMIT, two)).toBe(86_200n)
    expect(real.estimateGas(BundleKind.PROVE, two)).toBe(841_000n)
    expect(skip.estimateGas(BundleKind.PROVE, two)).toBe(41_000n)
    expect(real.estimateGas(BundleKind.EXECUTE, two)).toBe(46_000n)
  })

  test('refuses to encode an empty run', () => {
    expect(() => real.encode(BundleKind.COMMIT, [])).toThrow('cannot encode an empty bundle')
    expect(() => BundleEncoder.decode('0xdeadbeef')).toThrow()
  })
})
