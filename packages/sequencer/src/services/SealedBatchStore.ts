/* Sealed batches are handed to the store before their number is consumed.

   The in-memory store backs tests and the stdin-driven entry point. A database-backed
   store implements the same interface; persist must be idempotent for an identical batch. */

import { RESOURCE_DIMENSIONS, SealedBatch } from '@sealkeeper/dto'

export interface SealedBatchStore {
  persist(batch: SealedBatch): Promise<void>
  get(batchNumber: number): Promise<SealedBatch | null>
  /** Highest persisted batch number, or null for an empty store. */
  lastBatchNumber(): Promise<number | null>
  /** Persisted batches with number >= from, ascending. */
  since(from: number): Promise<SealedBatch[]>
}

/** Opaque state commitment for a batch about to be sealed. */
export interface StateRootProvider {
  stateRootFor(batchNumber: number): Promise<string>
}

export function sameBatch(a: SealedBatch, b: SealedBatch): boolean {
  if (a.batchNumber !== b.batchNumber || a.stateRoot !== b.stateRoot || a.txCount !== b.txCount) return false
  if (a.sealedAt !== b.sealedAt || a.sealReason.primary !== b.sealReason.primary) return false
  if (a.miniblocks.length !== b.miniblocks.length) return false
  return RESOURCE_DIMENSIONS.every(d => a.usage[d] === b.usage[d])
}

export class InMemorySealedBatchStore implements SealedBatchStore {
  private byNumber: Map<number, SealedBatch> = new Map()
  private last: number | null = null

  async persist(batch: SealedBatch): Promise<void> {
    const existing = this.byNumber.get(batch.batchNumber)
    if (existing) {
      if (sameBatch(existing, batch)) return
      throw new Error(`batch ${batch.batchNumber} already persisted with different contents`)
    }
    if (this.last !== null && batch.batchNumber !== this.last + 1) {
      throw new Error(`batch ${batch.batchNumber} does not follow ${this.last}`)
    }
    this.byNumber.set(batch.batchNumber, batch)
    this.last = batch.batchNumber
  }

  async get(batchNumber: number): Promise<SealedBatch | null> {
    return this.byNumber.get(batchNumber) ?? null
  }

  async lastBatchNumber(): Promise<number | null> {
    return this.last
  }

  async since(from: number): Promise<SealedBatch[]> {
    return [...this.byNumber.values()].filter(b => b.batchNumber >= from).sort((a, b) => a.batchNumber - b.batchNumber)
  }

  size() {
    return this.byNumber.size
  }
}

/** Returns whatever root was last reported by the execution side. */
export class LatestStateRootProvider implements StateRootProvider {
  private root: string

  constructor(initial = '0x' + '00'.repeat(32)) {
    this.root = initial
  }

  update(root: string) {
    if (!/^0x[0-9a-fA-F]{64}$/.test(root)) throw new Error(`invalid state root ${root}`)
    this.root = root.toLowerCase()
  }

  async stateRootFor(_batchNumber: number): Promise<string> {
    return this.root
  }
}
