import { EventEmitter } from 'events'
import {
  PendingBatch,
  RESOURCE_DIMENSIONS,
  ResourceUsage,
  SealReason,
  SealTrigger,
  SealedBatch,
  SealedMiniblock,
  TxCost,
} from '@sealkeeper/dto'
import { SealingInvariantViolation, TransactionRejected, reason } from '@sealkeeper/reasons'
import type { StateKeeperConfig } from '../config'
import { getLogger, logRejection, logSeal } from '../utils/logger'
import { countRejection, countSeal, setLastBatch } from '../utils/metrics'
import { Mutex } from '../utils/mutex'
import { AccountantState, ResourceAccountant } from './ResourceAccountant'
import { SealCriteria, mergeTriggers, sealReasonOf } from './SealCriteria'
import { SealedBatchStore, StateRootProvider } from './SealedBatchStore'

export type AdmissionResult =
  | { kind: 'rejected'; error: TransactionRejected }
  | {
      kind: 'admitted'
      miniblockSealed: boolean
      /** the previous batch, sealed to make room for this tx */
      sealedBefore?: SealedBatch
      sealedBatch?: SealedBatch
    }

export type TickResult = { miniblockSealed: boolean; sealedBatch?: SealedBatch }

export interface StateKeeperSnapshot extends AccountantState {
  readonly nextBatchNumber: number
  readonly halted: boolean
}

export interface StateKeeperOptions {
  config: StateKeeperConfig
  store: SealedBatchStore
  stateRoots: StateRootProvider
  clock?: () => number
  /** defaults to config.firstBatchNumber */
  nextBatchNumber?: number
}

type SealDraft = {
  batchNumber: number
  batch: PendingBatch
  sealReason: SealReason
  sealedAt: number
  stateRoot?: string
}

const log = getLogger('state-keeper')

function frozenUsage(u: ResourceUsage): Readonly<ResourceUsage> {
  return Object.freeze({ ...u })
}

/**
 * Single writer over the open miniblock and batch.
 * submit / tick / resume are serialized through a FIFO mutex; sealed batches are emitted as 'batch.sealed'
 * only after the store accepted them.
 */
export class StateKeeper extends EventEmitter {
  private readonly store: SealedBatchStore
  private readonly stateRoots: StateRootProvider
  private readonly clock: () => number
  private readonly criteria: SealCriteria
  private readonly accountant: ResourceAccountant
  private readonly mutex = new Mutex()
  private nextBatchNumber: number
  private halted?: SealDraft

  constructor(opts: StateKeeperOptions) {
    super()
    this.store = opts.store
    this.stateRoots = opts.stateRoots
    this.clock = opts.clock ?? Date.now
    this.criteria = new SealCriteria(opts.config)
    this.accountant = new ResourceAccountant(this.clock())
    this.nextBatchNumber = opts.nextBatchNumber ?? opts.config.firstBatchNumber
  }

  /** Continue numbering after the highest batch already in the store. */
  static async fromStore(opts: Omit<StateKeeperOptions, 'nextBatchNumber'>): Promise<StateKeeper> {
    const last = await opts.store.lastBatchNumber()
    const next = last === null ? opts.config.firstBatchNumber : last + 1
    return new StateKeeper({ ...opts, nextBatchNumber: next })
  }

  get isHalted(): boolean {
    return this.halted !== undefined
  }

  submit(cost: TxCost): Promise<AdmissionResult> {
    return this.mutex.run(() => this.submitLocked(cost))
  }

  tick(): Promise<TickResult> {
    return this.mutex.run(() => this.tickLocked())
  }

  /** Retry persisting the batch whose seal failed. Admission reopens once it succeeds. */
  resume(): Promise<SealedBatch | undefined> {
    return this.mutex.run(async () => {
      const draft = this.halted
      if (!draft) return undefined
      const sealed = await this.persistDraft(draft)
      log.info({ event: 'state_keeper.resumed', batchNumber: sealed.batchNumber })
      return sealed
    })
  }

  snapshot(): StateKeeperSnapshot {
    return Object.freeze({ ...this.accountant.state(), nextBatchNumber: this.nextBatchNumber, halted: this.isHalted })
  }

  private ensureRunning(): void {
    if (this.halted) {
      throw new SealingInvariantViolation(reason('SEAL_HALTED', { context: { batchNumber: this.halted.batchNumber } }))
    }
  }

  private async submitLocked(cost: TxCost): Promise<AdmissionResult> {
    this.ensureRunning()
    if (cost.gas < 0n || cost.dataSize < 0n || cost.geometry < 0n || cost.pubdata < 0n) {
      throw new RangeError(`negative resource measurement for ${cost.txHash}`)
    }
    const now = this.clock()

    const check = this.criteria.rejection(cost)
    if (check) {
      const detail = reason(check.code, {
        context: {
          txHash: cost.txHash,
          ...(check.dimension ? { dimension: check.dimension } : {}),
          projected: check.projected.toString(),
          threshold: check.threshold.toString(),
        },
      })
      logRejection({
        txHash: cost.txHash,
        reason_code: check.code,
        dimension: check.dimension,
        projected: check.projected.toString(),
        threshold: check.threshold.toString(),
      })
      countRejection(check.code, check.dimension)
      return { kind: 'rejected', error: new TransactionRejected(detail, cost.txHash, check.dimension) }
    }

    // fits an empty batch but not this one: seal first, then admit into the next batch
    const overflow = this.criteria.overflowTriggers(this.accountant.projected(cost))
    const sealedBefore = overflow.length ? await this.sealForOverflow(cost, overflow, now) : undefined

    // an idle empty miniblock or batch starts its clock with its first tx
    this.accountant.touchMiniblock(now)
    this.accountant.touchBatch(now)
    this.accountant.admit(cost)

    const miniblockSealed = this.maybeSealMiniblock(now) !== undefined
    const sealedBatch = await this.maybeSealBatch(now)
    return {
      kind: 'admitted',
      miniblockSealed: miniblockSealed || sealedBefore !== undefined || sealedBatch !== undefined,
      sealedBefore,
      sealedBatch,
    }
  }

  private async tickLocked(): Promise<TickResult> {
    this.ensureRunning()
    const now = this.clock()
    const miniblockSealed = this.maybeSealMiniblock(now) !== undefined
    const sealedBatch = await this.maybeSealBatch(now)
    return { miniblockSealed: miniblockSealed || sealedBatch !== undefined, sealedBatch }
  }

  private maybeSealMiniblock(now: number): SealedMiniblock | undefined {
    const { miniblock } = this.accountant.state()
    if (!this.criteria.miniblockDue(miniblock.openedAt, now)) return undefined
    if (this.accountant.isMiniblockEmpty) {
      this.accountant.touchMiniblock(now)
      return undefined
    }
    const sealed = this.accountant.sealMiniblock(now)
    if (sealed) log.debug({ event: 'miniblock.sealed', number: sealed.number, txs: sealed.txHashes.length })
    return sealed
  }

  private async maybeSealBatch(now: number): Promise<SealedBatch | undefined> {
    if (this.accountant.isBatchEmpty) {
      this.accountant.touchBatch(now)
      return undefined
    }
    const { batch } = this.accountant.state()
    const sealReason = sealReasonOf(this.criteria.batchTriggers(batch.usage, batch.txCount, batch.openedAt, now))
    if (!sealReason) return undefined
    return this.sealBatch(sealReason, now)
  }

  private async sealForOverflow(cost: TxCost, overflow: readonly SealTrigger[], now: number): Promise<SealedBatch | undefined> {
    if (this.accountant.isBatchEmpty) return undefined
    const { batch } = this.accountant.state()
    const fired = this.criteria.batchTriggers(batch.usage, batch.txCount, batch.openedAt, now)
    const sealReason = sealReasonOf(mergeTriggers(fired, overflow))
    if (!sealReason) return undefined
    log.debug({ event: 'batch.overflow_seal', txHash: cost.txHash, triggers: overflow })
    return this.sealBatch(sealReason, now)
  }

  private sealBatch(sealReason: SealReason, now: number): Promise<SealedBatch> {
    this.accountant.sealMiniblock(now)
    this.accountant.markSealing()
    const draft: SealDraft = {
      batchNumber: this.nextBatchNumber,
      batch: this.accountant.state().batch,
      sealReason,
      sealedAt: now,
    }
    return this.persistDraft(draft)
  }

  private async writeDraft(draft: SealDraft): Promise<SealedBatch> {
    if (draft.stateRoot === undefined) draft.stateRoot = await this.stateRoots.stateRootFor(draft.batchNumber)
    const sealed: SealedBatch = Object.freeze({
      batchNumber: draft.batchNumber,
      stateRoot: draft.stateRoot,
      usage: frozenUsage(draft.batch.usage),
      txCount: draft.batch.txCount,
      miniblocks: Object.freeze([...draft.batch.miniblocks]),
      sealReason: draft.sealReason,
      openedAt: draft.batch.openedAt,
      sealedAt: draft.sealedAt,
    })
    await this.store.persist(sealed)
    return sealed
  }

  private async persistDraft(draft: SealDraft): Promise<SealedBatch> {
    let sealed: SealedBatch
    try {
      sealed = await this.writeDraft(draft)
    } catch (err) {
      this.halted = draft
      const message = err instanceof Error ? err.message : String(err)
      log.error({ event: 'batch.persist_failed', batchNumber: draft.batchNumber, err: message })
      throw new SealingInvariantViolation(
        reason('SEAL_PERSIST_FAILED', { context: { batchNumber: draft.batchNumber, cause: message } }),
      )
    }

    this.halted = undefined
    this.nextBatchNumber = draft.batchNumber + 1
    this.accountant.reset(this.clock())
    logSeal({
      batchNumber: sealed.batchNumber,
      primary: sealed.sealReason.primary,
      triggers: sealed.sealReason.triggers,
      txCount: sealed.txCount,
      miniblocks: sealed.miniblocks.length,
      usage: Object.fromEntries(RESOURCE_DIMENSIONS.map(d => [d, sealed.usage[d].toString()])),
    })
    countSeal(sealed.sealReason.primary)
    setLastBatch('sealed', sealed.batchNumber)
    this.emit('batch.sealed', sealed)
    return sealed
  }
}
