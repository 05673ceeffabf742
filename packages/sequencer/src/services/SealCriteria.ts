/**
 * SealCriteria
 * Pure decision functions of the sealing policy: hard rejection of a candidate tx and
 * the set of batch seal triggers that fire for the current totals.
 */
import {
  RESOURCE_DIMENSIONS,
  ReasonCode,
  ResourceDimension,
  ResourceUsage,
  SEAL_TRIGGER_ORDER,
  SealReason,
  SealTrigger,
  TxCost,
} from '@sealkeeper/dto'
import { thresholdOf } from '@sealkeeper/math'
import type { StateKeeperConfig } from '../config'
import { costOf } from './ResourceAccountant'

export type RejectionCheck = {
  code: ReasonCode
  dimension?: ResourceDimension
  projected: bigint
  threshold: bigint
}

const REJECT_CODE: Record<ResourceDimension, ReasonCode> = {
  [ResourceDimension.GAS]: 'REJECT_GAS_LIMIT',
  [ResourceDimension.DATA_SIZE]: 'REJECT_DATA_SIZE',
  [ResourceDimension.GEOMETRY]: 'REJECT_GEOMETRY',
  [ResourceDimension.PUBDATA]: 'REJECT_PUBDATA',
}

const CLOSE_TRIGGER: Record<ResourceDimension, SealTrigger> = {
  [ResourceDimension.GAS]: SealTrigger.GAS,
  [ResourceDimension.DATA_SIZE]: SealTrigger.DATA_SIZE,
  [ResourceDimension.GEOMETRY]: SealTrigger.GEOMETRY,
  [ResourceDimension.PUBDATA]: SealTrigger.PUBDATA,
}

export function ceilingOf(config: StateKeeperConfig, dimension: ResourceDimension): bigint {
  switch (dimension) {
    case ResourceDimension.GAS:
      return config.maxGasPerBatch
    case ResourceDimension.DATA_SIZE:
      return config.maxEthParamsPerBatch
    case ResourceDimension.GEOMETRY:
      return config.maxGeometryPerBatch
    case ResourceDimension.PUBDATA:
      return config.maxPubdataPerBatch
  }
}

function perDimension(fn: (d: ResourceDimension) => bigint): Record<ResourceDimension, bigint> {
  return {
    [ResourceDimension.GAS]: fn(ResourceDimension.GAS),
    [ResourceDimension.DATA_SIZE]: fn(ResourceDimension.DATA_SIZE),
    [ResourceDimension.GEOMETRY]: fn(ResourceDimension.GEOMETRY),
    [ResourceDimension.PUBDATA]: fn(ResourceDimension.PUBDATA),
  }
}

export class SealCriteria {
  private readonly rejectAt: Record<ResourceDimension, bigint>
  private readonly closeAt: Record<ResourceDimension, bigint>

  constructor(private readonly config: StateKeeperConfig) {
    this.rejectAt = perDimension(d => thresholdOf(config.rejectTxAt[d], ceilingOf(config, d)))
    this.closeAt = perDimension(d => thresholdOf(config.closeBlockAt[d], ceilingOf(config, d)))
  }

  /**
   * First check a candidate tx fails on its own, or undefined when it fits an empty batch.
   * A tx that only overflows the current batch is not rejected; see `overflowTriggers`.
   */
  rejection(cost: TxCost): RejectionCheck | undefined {
    if (cost.gas > this.config.maxSingleTxGas) {
      return { code: 'REJECT_SINGLE_TX_GAS', dimension: ResourceDimension.GAS, projected: cost.gas, threshold: this.config.maxSingleTxGas }
    }
    if (cost.encodedSize !== undefined && cost.encodedSize > this.config.maxTxSize) {
      return { code: 'REJECT_TX_TOO_LARGE', dimension: ResourceDimension.DATA_SIZE, projected: cost.encodedSize, threshold: this.config.maxTxSize }
    }
    if (cost.gasPrice !== undefined && cost.gasPrice < this.config.minimalL2GasPrice) {
      return { code: 'REJECT_FEE_TOO_LOW', projected: cost.gasPrice, threshold: this.config.minimalL2GasPrice }
    }
    for (const d of RESOURCE_DIMENSIONS) {
      const alone = costOf(cost, d)
      if (alone > this.rejectAt[d]) {
        return { code: REJECT_CODE[d], dimension: d, projected: alone, threshold: this.rejectAt[d] }
      }
    }
    return undefined
  }

  /**
   * Seal triggers for every dimension whose `projected` total (current batch plus the tx)
   * is above its reject threshold. Non-empty means the current batch seals before the tx is admitted.
   */
  overflowTriggers(projected: ResourceUsage): SealTrigger[] {
    const fired = new Set<SealTrigger>()
    for (const d of RESOURCE_DIMENSIONS) {
      if (projected[d] > this.rejectAt[d]) fired.add(CLOSE_TRIGGER[d])
    }
    return SEAL_TRIGGER_ORDER.filter(t => fired.has(t))
  }

  miniblockDue(openedAt: number, now: number): boolean {
    return now - openedAt > this.config.miniblockCommitDeadlineMs
  }

  /** Every batch trigger that fires, in tie-break order. */
  batchTriggers(usage: ResourceUsage, txCount: number, openedAt: number, now: number): SealTrigger[] {
    const fired = new Set<SealTrigger>()
    if (now - openedAt >= this.config.blockCommitDeadlineMs) fired.add(SealTrigger.DEADLINE)
    for (const d of RESOURCE_DIMENSIONS) {
      if (usage[d] >= this.closeAt[d]) fired.add(CLOSE_TRIGGER[d])
    }
    if (txCount >= this.config.transactionSlots) fired.add(SealTrigger.SLOTS)
    return SEAL_TRIGGER_ORDER.filter(t => fired.has(t))
  }
}

export function mergeTriggers(a: readonly SealTrigger[], b: readonly SealTrigger[]): SealTrigger[] {
  return SEAL_TRIGGER_ORDER.filter(t => a.includes(t) || b.includes(t))
}

export function sealReasonOf(triggers: readonly SealTrigger[]): SealReason | undefined {
  if (triggers.length === 0) return undefined
  return Object.freeze({ primary: triggers[0], triggers: Object.freeze([...triggers]) })
}
