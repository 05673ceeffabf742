import {
  BatchState,
  MiniblockState,
  PendingBatch,
  PendingMiniblock,
  RESOURCE_DIMENSIONS,
  ResourceDimension,
  ResourceUsage,
  SealedMiniblock,
  TxCost,
} from '@sealkeeper/dto'
import { exceeds } from '@sealkeeper/math'
import { batchMachine, miniblockMachine } from '../fsm/stateMachine'

export function emptyUsage(): ResourceUsage {
  return {
    [ResourceDimension.GAS]: 0n,
    [ResourceDimension.DATA_SIZE]: 0n,
    [ResourceDimension.GEOMETRY]: 0n,
    [ResourceDimension.PUBDATA]: 0n,
  }
}

export function costOf(cost: TxCost, dimension: ResourceDimension): bigint {
  switch (dimension) {
    case ResourceDimension.GAS:
      return cost.gas
    case ResourceDimension.DATA_SIZE:
      return cost.dataSize
    case ResourceDimension.GEOMETRY:
      return cost.geometry
    case ResourceDimension.PUBDATA:
      return cost.pubdata
  }
}

function addUsage(usage: ResourceUsage, cost: TxCost): void {
  for (const d of RESOURCE_DIMENSIONS) usage[d] += costOf(cost, d)
}

export interface AccountantState {
  readonly miniblock: Readonly<PendingMiniblock>
  readonly batch: Readonly<PendingBatch>
}

/**
 * Running totals for the open miniblock and the open batch.
 * The open miniblock is counted in the batch totals as soon as a tx is admitted.
 */
export class ResourceAccountant {
  private nextMiniblock: number
  private miniblock: PendingMiniblock
  private batch: PendingBatch

  constructor(now: number, firstMiniblockNumber = 1) {
    this.nextMiniblock = firstMiniblockNumber
    this.batch = this.openBatch(now)
    this.miniblock = this.openMiniblock(now)
  }

  private openBatch(now: number): PendingBatch {
    return { state: BatchState.OPEN, openedAt: now, txCount: 0, miniblocks: [], usage: emptyUsage() }
  }

  private openMiniblock(now: number): PendingMiniblock {
    return { number: this.nextMiniblock++, state: MiniblockState.OPEN, openedAt: now, txHashes: [], usage: emptyUsage() }
  }

  admit(cost: TxCost): AccountantState {
    addUsage(this.miniblock.usage, cost)
    addUsage(this.batch.usage, cost)
    this.miniblock.txHashes.push(cost.txHash)
    this.batch.txCount += 1
    return this.state()
  }

  /** Side-effect free check of the batch total for one dimension. */
  wouldExceed(cost: TxCost, dimension: ResourceDimension, limit: bigint): boolean {
    return exceeds(this.batch.usage[dimension], costOf(cost, dimension), limit)
  }

  projected(cost: TxCost): ResourceUsage {
    const out = { ...this.batch.usage }
    addUsage(out, cost)
    return out
  }

  /** Move the open miniblock into the batch and open the next one. Returns undefined when it is empty. */
  sealMiniblock(now: number): SealedMiniblock | undefined {
    if (this.miniblock.txHashes.length === 0) return undefined
    miniblockMachine.assert(this.miniblock.state, MiniblockState.SEALED, `miniblock ${this.miniblock.number}`)
    const sealed: SealedMiniblock = Object.freeze({
      number: this.miniblock.number,
      openedAt: this.miniblock.openedAt,
      sealedAt: now,
      txHashes: Object.freeze([...this.miniblock.txHashes]),
      usage: Object.freeze({ ...this.miniblock.usage }),
    })
    this.miniblock.state = MiniblockState.SEALED
    this.batch.miniblocks.push(sealed)
    this.miniblock = this.openMiniblock(now)
    return sealed
  }

  /** Restart the idle clock of an empty miniblock. */
  touchMiniblock(now: number): void {
    if (this.miniblock.txHashes.length === 0) this.miniblock.openedAt = now
  }

  touchBatch(now: number): void {
    if (this.batch.txCount === 0) this.batch.openedAt = now
  }

  markSealing(): void {
    batchMachine.assert(this.batch.state, BatchState.SEALING, 'batch')
    this.batch.state = BatchState.SEALING
  }

  /**
   * Close the batch and open a new one. The sealed batch's contents are returned detached from accountant state.
   */
  reset(now: number): PendingBatch {
    const closed = this.batch
    if (closed.state !== BatchState.OPEN) {
      batchMachine.assert(closed.state, BatchState.SEALED, 'batch')
      closed.state = BatchState.SEALED
    }
    this.batch = this.openBatch(now)
    if (this.miniblock.txHashes.length === 0) this.miniblock.openedAt = now
    return closed
  }

  get isMiniblockEmpty(): boolean {
    return this.miniblock.txHashes.length === 0
  }

  get isBatchEmpty(): boolean {
    return this.batch.txCount === 0
  }

  state(): AccountantState {
    return {
      miniblock: Object.freeze({ ...this.miniblock, txHashes: [...this.miniblock.txHashes], usage: { ...this.miniblock.usage } }),
      batch: Object.freeze({ ...this.batch, miniblocks: [...this.batch.miniblocks], usage: { ...this.batch.usage } }),
    }
  }
}
