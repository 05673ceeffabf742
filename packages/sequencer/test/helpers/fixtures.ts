import { ResourceDimension, SealReason, SealTrigger, SealedBatch, TxCost } from '@sealkeeper/dto'
import type { EthSenderConfig, GasAdjusterConfig, StateKeeperConfig } from '../../src/config'
import { ProofLoadingMode, ProofSendingMode } from '@sealkeeper/dto'

export const ROOT = '0x' + '11'.repeat(32)

export function pct(value: number): Record<ResourceDimension, number> {
  return {
    [ResourceDimension.GAS]: value,
    [ResourceDimension.DATA_SIZE]: value,
    [ResourceDimension.GEOMETRY]: value,
    [ResourceDimension.PUBDATA]: value,
  }
}

/** Mainnet-like limits with deadlines far enough out that only resource triggers fire. */
export function stateKeeperConfig(overrides: Partial<StateKeeperConfig> = {}): StateKeeperConfig {
  return {
    transactionSlots: 1500,
    miniblockCommitDeadlineMs: 2000,
    blockCommitDeadlineMs: 600_000,
    maxGasPerBatch: 5_000_000n,
    maxSingleTxGas: 4_000_000n,
    maxEthParamsPerBatch: 60_000n,
    maxGeometryPerBatch: 10_000n,
    maxPubdataPerBatch: 100_000n,
    maxTxSize: 1_000_000n,
    minimalL2GasPrice: 0n,
    closeBlockAt: pct(0.95),
    rejectTxAt: pct(0.95),
    firstBatchNumber: 1,
    ...overrides,
  }
}

export function ethSenderConfig(overrides: Partial<EthSenderConfig> = {}): EthSenderConfig {
  return {
    maxAggregatedTxGas: 5_000_000n,
    maxEthTxDataSize: 59_000,
    maxAggregatedBlocksToExecute: 5,
    aggregatedBlockCommitDeadlineMs: 1000,
    aggregatedBlockProveDeadlineMs: 1000,
    aggregatedBlockExecuteDeadlineMs: 1000,
    txPollPeriodMs: 1000,
    aggregateTxPollPeriodMs: 1000,
    txInclusionTimeoutMs: 3000,
    maxFeeBumps: 3,
    maxTxsInFlight: 30,
    waitConfirmations: 1,
    proofSendingMode: ProofSendingMode.ONLY_REAL_PROOFS,
    proofLoadingMode: ProofLoadingMode.OLD_PROOF_FROM_DB,
    ...overrides,
  }
}

export function gasAdjusterConfig(overrides: Partial<GasAdjusterConfig> = {}): GasAdjusterConfig {
  return {
    defaultPriorityFeePerGas: 1_000_000_000n,
    maxAcceptablePriorityFee: 100_000_000_000n,
    maxBaseFeeSamples: 5,
    pollPeriodMs: 5000,
    strategy: 'base_fee_ratio',
    ...overrides,
  }
}

let txSeq = 0

export function txHash(n: number): string {
  return '0x' + n.toString(16).padStart(64, '0')
}

export function cost(partial: Partial<TxCost> = {}): TxCost {
  txSeq += 1
  return {
    txHash: txHash(txSeq),
    gas: 0n,
    dataSize: 0n,
    geometry: 0n,
    pubdata: 0n,
    ...partial,
  }
}

const DEADLINE_REASON: SealReason = { primary: SealTrigger.DEADLINE, triggers: [SealTrigger.DEADLINE] }

/** A sealed batch with the given pubdata; everything else minimal. */
export function sealedBatch(batchNumber: number, pubdata = 100n): SealedBatch {
  return {
    batchNumber,
    stateRoot: ROOT,
    usage: {
      [ResourceDimension.GAS]: 50_000n,
      [ResourceDimension.DATA_SIZE]: 200n,
      [ResourceDimension.GEOMETRY]: 10n,
      [ResourceDimension.PUBDATA]: pubdata,
    },
    txCount: 2,
    miniblocks: [],
    sealReason: DEADLINE_REASON,
    openedAt: 0,
    sealedAt: 1,
  }
}

/** Manually advanced clock. */
export class FakeClock {
  constructor(public value = 1_000_000) {}

  now = (): number => this.value

  advance(ms: number): number {
    this.value += ms
    return this.value
  }
}
