import { ulid } from 'ulid'
import {
  AggregatedTxBundle,
  BUNDLE_KIND_ORDER,
  BundleKind,
  BundleState,
  SealedBatch,
} from '@sealkeeper/dto'
import { SealingInvariantViolation, reason } from '@sealkeeper/reasons'
import type { EthSenderConfig } from '../config'
import { getLogger, logTransition } from '../utils/logger'
import { countTransition, setLastBatch } from '../utils/metrics'
import { Mutex } from '../utils/mutex'
import { BundleEncoder, CALLDATA_HEADER_SIZE } from './BundleEncoder'
import { BatchProgress, ProofMode, gate, requiresRealProofs } from './ProofGate'

const log = getLogger('aggregator')

export type AggregatorLimits = Pick<
  EthSenderConfig,
  | 'maxAggregatedTxGas'
  | 'maxEthTxDataSize'
  | 'maxAggregatedBlocksToExecute'
  | 'maxTxsInFlight'
  | 'aggregatedBlockCommitDeadlineMs'
  | 'aggregatedBlockProveDeadlineMs'
  | 'aggregatedBlockExecuteDeadlineMs'
>

/** Receives terminal outcomes from the sender. */
export interface BundleListener {
  onConfirmed(bundle: AggregatedTxBundle): void
  onFailed(bundle: AggregatedTxBundle): void
}

export type AggregatorStatus = {
  lastSealed: number | null
  lastCommitted: number | null
  lastProven: number | null
  lastExecuted: number | null
  inFlight: number
  failed: string[]
}

type PerKind<T> = Record<BundleKind, T>

function perKind<T>(fn: (k: BundleKind) => T): PerKind<T> {
  return {
    [BundleKind.COMMIT]: fn(BundleKind.COMMIT),
    [BundleKind.PROVE]: fn(BundleKind.PROVE),
    [BundleKind.EXECUTE]: fn(BundleKind.EXECUTE),
  }
}

const STAGE_NAME: PerKind<string> = {
  [BundleKind.COMMIT]: 'committed',
  [BundleKind.PROVE]: 'proven',
  [BundleKind.EXECUTE]: 'executed',
}

export type BatchAggregatorOptions = {
  limits: AggregatorLimits
  proofMode: ProofMode
  firstBatchNumber: number
}

/**
 * BatchAggregator
 * - Accepts sealed batches strictly in order
 * - Forms commit / prove / execute bundles over contiguous runs under gas, size and count ceilings
 * - Tracks a contiguous confirmed frontier per kind
 */
export class BatchAggregator implements BundleListener {
  private readonly limits: AggregatorLimits
  private readonly proofMode: ProofMode
  private readonly encoder: BundleEncoder
  private readonly batches: Map<number, SealedBatch> = new Map()
  // insertion order is the submission order the sender follows
  private readonly bundles: Map<string, AggregatedTxBundle> = new Map()
  private readonly retried: Set<string> = new Set()
  private readonly firstBatchNumber: number
  private nextExpected: number
  private readonly assignedUpTo: PerKind<number>
  private readonly confirmedUpTo: PerKind<number>
  private readonly confirmedAhead: PerKind<Set<number>>
  // first time a batch was seen eligible for a kind, for partial-run deadlines
  private readonly firstSeen: PerKind<Map<number, number>>
  // formation awaits the proof gate; passes must not interleave
  private readonly mutex = new Mutex()

  constructor(opts: BatchAggregatorOptions) {
    this.limits = opts.limits
    this.proofMode = opts.proofMode
    this.encoder = new BundleEncoder(requiresRealProofs(opts.proofMode))
    this.firstBatchNumber = opts.firstBatchNumber
    this.nextExpected = opts.firstBatchNumber
    this.assignedUpTo = perKind(() => opts.firstBatchNumber - 1)
    this.confirmedUpTo = perKind(() => opts.firstBatchNumber - 1)
    this.confirmedAhead = perKind(() => new Set<number>())
    this.firstSeen = perKind(() => new Map<number, number>())
  }

  enqueue(batch: SealedBatch): void {
    if (batch.batchNumber !== this.nextExpected) {
      throw new SealingInvariantViolation(
        reason('SEAL_BATCH_GAP', { context: { expected: this.nextExpected, received: batch.batchNumber } }),
        `sealed batch ${batch.batchNumber} received, expected ${this.nextExpected}`,
      )
    }
    this.batches.set(batch.batchNumber, batch)
    this.nextExpected += 1
  }

  get(bundleId: string): AggregatedTxBundle | undefined {
    return this.bundles.get(bundleId)
  }

  /** Bundles waiting for their first send, in formation order. */
  pending(): AggregatedTxBundle[] {
    return [...this.bundles.values()].filter(b => b.state === BundleState.PENDING)
  }

  inFlight(): AggregatedTxBundle[] {
    return [...this.bundles.values()].filter(b => b.state === BundleState.PENDING || b.state === BundleState.SUBMITTED)
  }

  private hasOpenFailure(kind: BundleKind): boolean {
    for (const b of this.bundles.values()) {
      if (b.kind === kind && b.state === BundleState.FAILED && !this.retried.has(b.id)) return true
    }
    return false
  }

  private isConfirmed(kind: BundleKind, batchNumber: number): boolean {
    return batchNumber <= this.confirmedUpTo[kind]
  }

  private progressOf(batchNumber: number): BatchProgress {
    return {
      commitConfirmed: this.isConfirmed(BundleKind.COMMIT, batchNumber),
      proveFormed: batchNumber <= this.assignedUpTo[BundleKind.PROVE],
      proveConfirmed: this.isConfirmed(BundleKind.PROVE, batchNumber),
    }
  }

  private deadlineOf(kind: BundleKind): number {
    switch (kind) {
      case BundleKind.COMMIT:
        return this.limits.aggregatedBlockCommitDeadlineMs
      case BundleKind.PROVE:
        return this.limits.aggregatedBlockProveDeadlineMs
      case BundleKind.EXECUTE:
        return this.limits.aggregatedBlockExecuteDeadlineMs
    }
  }

  /**
   * Form every bundle that is ready at `now`, trying commit, prove, execute in order.
   */
  aggregate(now: number): Promise<AggregatedTxBundle[]> {
    return this.mutex.run(() => this.aggregateLocked(now))
  }

  private async aggregateLocked(now: number): Promise<AggregatedTxBundle[]> {
    const formed: AggregatedTxBundle[] = []
    for (const kind of BUNDLE_KIND_ORDER) {
      if (this.hasOpenFailure(kind)) {
        log.debug({ event: 'aggregate.blocked', kind })
        continue
      }
      while (this.inFlight().length < this.limits.maxTxsInFlight) {
        const bundle = await this.formBundle(kind, now)
        if (!bundle) break
        formed.push(bundle)
      }
    }
    return formed
  }

  private async formBundle(kind: BundleKind, now: number): Promise<AggregatedTxBundle | undefined> {
    const chosen: SealedBatch[] = []
    const proofs: string[] = []
    let gas = this.encoder.baseGas(kind)
    let size = CALLDATA_HEADER_SIZE
    let full = false
    let overflow = false

    for (let n = this.assignedUpTo[kind] + 1; ; n++) {
      const batch = this.batches.get(n)
      if (!batch) break
      if (kind === BundleKind.PROVE && !this.isConfirmed(BundleKind.COMMIT, n)) break
      const decision = await gate(this.proofMode, kind, n, this.progressOf(n))
      if (!decision.open) {
        if (decision.reason.code === 'PROOF_UNAVAILABLE') log.debug({ event: 'proof.unavailable', kind, batchNumber: n })
        else log.warn({ event: 'proof.load_failed', kind, batchNumber: n, reason: decision.reason })
        break
      }
      if (!this.firstSeen[kind].has(n)) this.firstSeen[kind].set(n, now)

      const batchGas = this.encoder.batchGas(kind, batch)
      const batchSize = this.encoder.batchSize(kind, (decision.proof.length - 2) / 2)
      if (gas + batchGas > this.limits.maxAggregatedTxGas || size + batchSize > this.limits.maxEthTxDataSize) {
        if (chosen.length === 0) {
          // a lone batch over a ceiling still has to reach L1
          chosen.push(batch)
          proofs.push(decision.proof)
          overflow = true
        }
        full = true
        break
      }
      gas += batchGas
      size += batchSize
      chosen.push(batch)
      proofs.push(decision.proof)
      if (chosen.length >= this.limits.maxAggregatedBlocksToExecute) {
        full = true
        break
      }
    }

    if (chosen.length === 0) return undefined
    const first = chosen[0].batchNumber
    if (!full) {
      const since = this.firstSeen[kind].get(first) ?? now
      if (now - since < this.deadlineOf(kind)) return undefined
    }

    const last = chosen[chosen.length - 1].batchNumber
    if (overflow) {
      log.warn({ event: 'aggregate.overflow', reason_code: 'AGGREGATION_OVERFLOW', kind, batchNumber: first })
    }
    const bundle = this.createBundle(kind, chosen, this.encoder.encode(kind, chosen, proofs), now)
    this.assignedUpTo[kind] = last
    for (let n = first; n <= last; n++) this.firstSeen[kind].delete(n)
    return bundle
  }

  private createBundle(kind: BundleKind, batches: readonly SealedBatch[], payload: string, now: number): AggregatedTxBundle {
    const bundle: AggregatedTxBundle = {
      id: ulid(),
      kind,
      firstBatch: batches[0].batchNumber,
      lastBatch: batches[batches.length - 1].batchNumber,
      payload,
      payloadSize: BundleEncoder.payloadSize(payload),
      estimatedGas: this.encoder.estimateGas(kind, batches),
      state: BundleState.PENDING,
      attempts: 0,
      txHashes: [],
      createdAt: now,
    }
    this.bundles.set(bundle.id, bundle)
    logTransition({ subject: bundle.id, kind, from: 'NONE', to: BundleState.PENDING, first_batch: bundle.firstBatch, last_batch: bundle.lastBatch })
    countTransition(kind, 'NONE', BundleState.PENDING)
    return bundle
  }

  onConfirmed(bundle: AggregatedTxBundle): void {
    const kind = bundle.kind
    for (let n = bundle.firstBatch; n <= bundle.lastBatch; n++) this.confirmedAhead[kind].add(n)
    while (this.confirmedAhead[kind].has(this.confirmedUpTo[kind] + 1)) {
      this.confirmedUpTo[kind] += 1
      this.confirmedAhead[kind].delete(this.confirmedUpTo[kind])
    }
    setLastBatch(STAGE_NAME[kind], this.confirmedUpTo[kind])
    if (kind === BundleKind.EXECUTE) this.prune()
  }

  onFailed(bundle: AggregatedTxBundle): void {
    log.error({ event: 'aggregate.bundle_failed', bundleId: bundle.id, kind: bundle.kind, first_batch: bundle.firstBatch, last_batch: bundle.lastBatch, reason_code: bundle.failure })
  }

  /**
   * Operator hook: re-form the range of a failed bundle as a new pending bundle.
   * Formation of that kind resumes once no unretried failure remains.
   */
  retryFailed(bundleId: string, now: number): AggregatedTxBundle {
    const failed = this.bundles.get(bundleId)
    if (!failed || failed.state !== BundleState.FAILED) throw new Error(`bundle ${bundleId} is not failed`)
    if (this.retried.has(bundleId)) throw new Error(`bundle ${bundleId} was already retried`)
    const batches: SealedBatch[] = []
    for (let n = failed.firstBatch; n <= failed.lastBatch; n++) {
      const b = this.batches.get(n)
      if (!b) throw new Error(`batch ${n} of bundle ${bundleId} is no longer held`)
      batches.push(b)
    }
    this.retried.add(bundleId)
    // same range, same calldata; proofs are already encoded in the failed payload
    const bundle = this.createBundle(failed.kind, batches, failed.payload, now)
    log.info({ event: 'aggregate.retried', failed: bundleId, bundleId: bundle.id, kind: bundle.kind })
    return bundle
  }

  // executed batches are final; drop them with every settled bundle over them
  private prune(): void {
    const executed = this.confirmedUpTo[BundleKind.EXECUTE]
    for (const n of [...this.batches.keys()]) {
      if (n <= executed) this.batches.delete(n)
    }
    for (const [id, b] of [...this.bundles]) {
      if (b.lastBatch > executed) continue
      const settled = b.state === BundleState.CONFIRMED || (b.state === BundleState.FAILED && this.retried.has(id))
      if (!settled) continue
      this.bundles.delete(id)
      this.retried.delete(id)
    }
  }

  status(): AggregatorStatus {
    const orNull = (n: number) => (n < this.firstBatchNumber ? null : n)
    return {
      lastSealed: orNull(this.nextExpected - 1),
      lastCommitted: orNull(this.confirmedUpTo[BundleKind.COMMIT]),
      lastProven: orNull(this.confirmedUpTo[BundleKind.PROVE]),
      lastExecuted: orNull(this.confirmedUpTo[BundleKind.EXECUTE]),
      inFlight: this.inFlight().length,
      failed: [...this.bundles.values()].filter(b => b.state === BundleState.FAILED && !this.retried.has(b.id)).map(b => b.id),
    }
  }
}
