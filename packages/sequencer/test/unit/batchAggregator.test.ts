import { AggregatedTxBundle, BundleKind, BundleState } from '@sealkeeper/dto'
import { SealingInvariantViolation } from '@sealkeeper/reasons'
import { BatchAggregator } from '../../src/services/BatchAggregator'
import { BundleEncoder } from '../../src/services/BundleEncoder'
import { InMemoryProofSource, ProofMode, ProofStore } from '../../src/services/ProofGate'
import { EthSenderConfig } from '../../src/config'
import { ethSenderConfig, sealedBatch } from '../helpers/fixtures'

const SKIP: ProofMode = { kind: 'skip' }
const NO_WAIT = { aggregatedBlockCommitDeadlineMs: 0, aggregatedBlockProveDeadlineMs: 0, aggregatedBlockExecuteDeadlineMs: 0 }

function aggregator(overrides: Partial<EthSenderConfig> = {}, proofMode: ProofMode = SKIP, firstBatchNumber = 1) {
  return new BatchAggregator({ limits: ethSenderConfig(overrides), proofMode, firstBatchNumber })
}

function enqueueRange(agg: BatchAggregator, from: number, to: number, pubdata = 100n) {
  for (let n = from; n <= to; n++) agg.enqueue(sealedBatch(n, pubdata))
}

function confirm(agg: BatchAggregator, bundle: AggregatedTxBundle) {
  bundle.state = BundleState.CONFIRMED
  agg.onConfirmed(bundle)
}

function ranges(bundles: AggregatedTxBundle[]) {
  return bundles.map(b => [b.kind, b.firstBatch, b.lastBatch])
}

describe('BatchAggregator', () => {
  test('accepts sealed batches strictly in order', () => {
    const agg = aggregator()
    agg.enqueue(sealedBatch(1))
    expect(() => agg.enqueue(sealedBatch(3))).toThrow(SealingInvariantViolation)
    expect(() => agg.enqueue(sealedBatch(1))).toThrow('sealed batch 1 received, expected 2')
    agg.enqueue(sealedBatch(2))
    expect(agg.status().lastSealed).toBe(2)
  })

  test('count ceiling closes a bundle; a partial run waits for its deadline', async () => {
    const agg = aggregator()
    enqueueRange(agg, 1, 7)
    expect(ranges(await agg.aggregate(0))).toEqual([[BundleKind.COMMIT, 1, 5]])
    expect(await agg.aggregate(999)).toEqual([])
    expect(ranges(await agg.aggregate(1000))).toEqual([[BundleKind.COMMIT, 6, 7]])
  })

  test('gas ceiling splits runs', async () => {
    // 21000 + 2 * (31000 + 16 * 100)
    const agg = aggregator({ maxAggregatedTxGas: 86_200n })
    enqueueRange(agg, 1, 5)
    const formed = await agg.aggregate(0)
    expect(ranges(formed)).toEqual([
      [BundleKind.COMMIT, 1, 2],
      [BundleKind.COMMIT, 3, 4],
    ])
    expect(formed[0].estimatedGas).toBe(86_200n)
  })

  test('calldata ceiling splits runs', async () => {
    const agg = aggregator({ maxEthTxDataSize: 132 + 3 * 160 })
    enqueueRange(agg, 1, 4)
    const formed = await agg.aggregate(0)
    expect(ranges(formed)).toEqual([[BundleKind.COMMIT, 1, 3]])
    expect(formed[0].payloadSize).toBe(612)
    expect(BundleEncoder.decode(formed[0].payload)).toEqual({ name: 'commitBatches', firstBatch: 1, lastBatch: 3 })
  })

  test('a lone batch over a ceiling forms its own bundle', async () => {
    const agg = aggregator({ maxAggregatedTxGas: 50_000n })
    enqueueRange(agg, 1, 2, 10_000n)
    const formed = await agg.aggregate(0)
    expect(ranges(formed)).toEqual([
      [BundleKind.COMMIT, 1, 1],
      [BundleKind.COMMIT, 2, 2],
    ])
    expect(formed[0].estimatedGas).toBe(212_000n)
  })

  test('bundles are PENDING with a fresh id', async () => {
    const agg = aggregator(NO_WAIT)
    enqueueRange(agg, 1, 1)
    const [bundle] = await agg.aggregate(0)
    expect(bundle.state).toBe(BundleState.PENDING)
    expect(bundle.attempts).toBe(0)
    expect(bundle.txHashes).toEqual([])
    expect(agg.get(bundle.id)).toBe(bundle)
    expect(agg.pending()).toEqual([bundle])
  })

  test('concurrent passes never form the same range twice', async () => {
    class SlowStore implements ProofStore {
      calls = 0

      async loadProof(): Promise<string | null> {
        this.calls += 1
        await new Promise(resolve => setTimeout(resolve, 20))
        return '0x' + 'ab'.repeat(40)
      }
    }
    const store = new SlowStore()
    const agg = aggregator(NO_WAIT, { kind: 'store', store })
    enqueueRange(agg, 1, 2)
    const [commit] = await agg.aggregate(1)
    confirm(agg, commit)

    const [a, b] = await Promise.all([agg.aggregate(1), agg.aggregate(1)])
    expect(ranges([...a, ...b])).toEqual([[BundleKind.PROVE, 1, 2]])
    expect(store.calls).toBe(2)
    expect(agg.pending()).toHaveLength(1)
  })

  test('settled bundles are dropped once their batches are executed', async () => {
    const agg = aggregator(NO_WAIT)
    enqueueRange(agg, 1, 2)
    const [failed] = await agg.aggregate(0)
    failed.state = BundleState.FAILED
    agg.onFailed(failed)
    const commit = agg.retryFailed(failed.id, 1)
    confirm(agg, commit)

    const [prove, execute] = await agg.aggregate(2)
    confirm(agg, prove)
    expect(agg.get(commit.id)).toBe(commit)
    confirm(agg, execute)

    for (const b of [failed, commit, prove, execute]) expect(agg.get(b.id)).toBeUndefined()
    expect(agg.status()).toMatchObject({ lastExecuted: 2, inFlight: 0, failed: [] })
    expect(() => agg.retryFailed(failed.id, 3)).toThrow(`bundle ${failed.id} is not failed`)
  })

  test('skip mode forms prove and execute as soon as the commit is confirmed', async () => {
    const agg = aggregator(NO_WAIT)
    enqueueRange(agg, 1, 2)
    const [commit] = await agg.aggregate(0)
    expect(ranges([commit])).toEqual([[BundleKind.COMMIT, 1, 2]])
    expect(await agg.aggregate(0)).toEqual([])

    confirm(agg, commit)
    expect(ranges(await agg.aggregate(0))).toEqual([
      [BundleKind.PROVE, 1, 2],
      [BundleKind.EXECUTE, 1, 2],
    ])
  })

  test('real proofs gate prove per batch and execute on prove confirmation', async () => {
    const source = new InMemoryProofSource()
    const agg = aggregator(NO_WAIT, { kind: 'real', source })
    enqueueRange(agg, 1, 2)
    const [commit] = await agg.aggregate(0)
    confirm(agg, commit)
    expect(await agg.aggregate(0)).toEqual([])

    source.report(1, '0x' + 'ab'.repeat(40))
    const [prove] = await agg.aggregate(0)
    expect(ranges([prove])).toEqual([[BundleKind.PROVE, 1, 1]])
    expect(prove.payloadSize).toBe(132 + 128)
    expect(prove.estimatedGas).toBe(831_000n)
    expect(await agg.aggregate(0)).toEqual([])

    confirm(agg, prove)
    expect(ranges(await agg.aggregate(0))).toEqual([[BundleKind.EXECUTE, 1, 1]])
  })

  test('never exceeds max_txs_in_flight', async () => {
    const agg = aggregator({ ...NO_WAIT, maxTxsInFlight: 1, maxAggregatedBlocksToExecute: 1 })
    enqueueRange(agg, 1, 3)
    expect(ranges(await agg.aggregate(0))).toEqual([[BundleKind.COMMIT, 1, 1]])
    expect(await agg.aggregate(0)).toEqual([])
    expect(agg.inFlight()).toHaveLength(1)
  })

  test('a failed bundle blocks its kind until retried with the same range and calldata', async () => {
    const agg = aggregator({ ...NO_WAIT, maxAggregatedBlocksToExecute: 1 })
    enqueueRange(agg, 1, 1)
    const [failed] = await agg.aggregate(0)
    failed.state = BundleState.FAILED
    failed.failure = 'SUBMIT_REVERTED'
    agg.onFailed(failed)

    enqueueRange(agg, 2, 2)
    expect(await agg.aggregate(0)).toEqual([])
    expect(agg.status().failed).toEqual([failed.id])
    expect(() => agg.retryFailed('missing', 0)).toThrow('bundle missing is not failed')

    const retry = agg.retryFailed(failed.id, 5)
    expect(retry.id).not.toBe(failed.id)
    expect(retry).toMatchObject({ kind: BundleKind.COMMIT, firstBatch: 1, lastBatch: 1, payload: failed.payload, state: BundleState.PENDING, createdAt: 5 })
    expect(() => agg.retryFailed(failed.id, 6)).toThrow(`bundle ${failed.id} was already retried`)
    expect(agg.status().failed).toEqual([])

    expect(ranges(await agg.aggregate(0))).toEqual([[BundleKind.COMMIT, 2, 2]])
  })

  test('the confirmed frontier only advances over contiguous ranges', async () => {
    const agg = aggregator({ ...NO_WAIT, maxAggregatedBlocksToExecute: 1 })
    enqueueRange(agg, 1, 2)
    const [c1, c2] = await agg.aggregate(0)
    confirm(agg, c2)
    expect(agg.status().lastCommitted).toBeNull()
    confirm(agg, c1)
    expect(agg.status()).toMatchObject({ lastSealed: 2, lastCommitted: 2, lastProven: null, lastExecuted: null })
  })

  test('status numbers respect a non-default first batch', async () => {
    const agg = aggregator(NO_WAIT, SKIP, 10)
    expect(agg.status().lastSealed).toBeNull()
    enqueueRange(agg, 10, 14)
    const [commit] = await agg.aggregate(0)
    expect(ranges([commit])).toEqual([[BundleKind.COMMIT, 10, 14]])
    confirm(agg, commit)
    expect(agg.status()).toMatchObject({ lastSealed: 14, lastCommitted: 14 })
  })
})
