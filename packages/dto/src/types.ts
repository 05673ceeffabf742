import { BatchState, BundleKind, BundleState, MiniblockState, ReasonCode, ResourceDimension, SealTrigger } from './enums'

/** Resource usage along the four independently metered dimensions. */
export type ResourceUsage = Record<ResourceDimension, bigint>

/** Measurements reported by the execution engine for one executed transaction. */
export interface TxCost {
  txHash: string
  gas: bigint
  /** bytes this tx adds to the batch's L1 commit data ("eth_params") */
  dataSize: bigint
  /** proving circuits consumed */
  geometry: bigint
  pubdata: bigint
  /** raw encoded transaction size in bytes */
  encodedSize?: bigint
  /** offered L2 gas price in wei */
  gasPrice?: bigint
}

export interface PendingMiniblock {
  number: number
  state: MiniblockState
  openedAt: number
  txHashes: string[]
  usage: ResourceUsage
}

export interface SealedMiniblock {
  readonly number: number
  readonly openedAt: number
  readonly sealedAt: number
  readonly txHashes: readonly string[]
  readonly usage: Readonly<ResourceUsage>
}

export interface PendingBatch {
  state: BatchState
  openedAt: number
  txCount: number
  miniblocks: SealedMiniblock[]
  usage: ResourceUsage
}

export interface SealReason {
  /** first fired trigger in tie-break order */
  readonly primary: SealTrigger
  readonly triggers: readonly SealTrigger[]
}

export interface SealedBatch {
  readonly batchNumber: number
  readonly stateRoot: string
  readonly usage: Readonly<ResourceUsage>
  readonly txCount: number
  readonly miniblocks: readonly SealedMiniblock[]
  readonly sealReason: SealReason
  readonly openedAt: number
  readonly sealedAt: number
}

export interface BundleFees {
  maxFeePerGas: bigint
  maxPriorityFeePerGas: bigint
}

export interface AggregatedTxBundle {
  id: string
  kind: BundleKind
  firstBatch: number
  lastBatch: number
  /** 0x-prefixed calldata */
  payload: string
  payloadSize: number
  estimatedGas: bigint
  state: BundleState
  fees?: BundleFees
  nonce?: number
  attempts: number
  txHashes: string[]
  createdAt: number
  submittedAt?: number
  lastAttemptAt?: number
  confirmedAt?: number
  failure?: ReasonCode
}
