/**
 * BundleEncoder
 * ABI-encodes commit / prove / execute calldata against the executor interface and estimates
 * gas and payload size per batch, so the aggregator can accumulate ceilings before encoding.
 */
import { Interface, dataLength } from 'ethers'
import { BundleKind, ResourceDimension, SealedBatch } from '@sealkeeper/dto'

export const EXECUTOR_ABI = [
  'function commitBatches(uint64 firstBatch, uint64 lastBatch, tuple(uint64 batchNumber, bytes32 stateRoot, uint64 txCount, uint256 pubdataBytes, uint256 gasUsed)[] batches)',
  'function proveBatches(uint64 firstBatch, uint64 lastBatch, bytes[] proofs)',
  'function executeBatches(uint64 firstBatch, uint64 lastBatch, tuple(uint64 batchNumber, bytes32 stateRoot)[] batches)',
]

export const INTRINSIC_GAS = 21_000n
export const COMMIT_BASE_GAS_PER_BATCH = 31_000n
export const COMMIT_GAS_PER_PUBDATA_BYTE = 16n
export const PROVE_GAS_PER_BATCH = 10_000n
export const PROVE_VERIFIER_GAS = 800_000n
export const EXECUTE_GAS_PER_BATCH = 12_500n

/** selector + two uint64 heads + array offset + array length */
export const CALLDATA_HEADER_SIZE = 4 + 32 * 4

const iface = new Interface(EXECUTOR_ABI)

function paddedWords(bytes: number): number {
  return Math.ceil(bytes / 32) * 32
}

export class BundleEncoder {
  constructor(private readonly realProofs: boolean) {}

  /** Fixed gas of a bundle of `kind`, before any batch is added. */
  baseGas(kind: BundleKind): bigint {
    if (kind === BundleKind.PROVE && this.realProofs) return INTRINSIC_GAS + PROVE_VERIFIER_GAS
    return INTRINSIC_GAS
  }

  batchGas(kind: BundleKind, batch: SealedBatch): bigint {
    switch (kind) {
      case BundleKind.COMMIT:
        return COMMIT_BASE_GAS_PER_BATCH + COMMIT_GAS_PER_PUBDATA_BYTE * batch.usage[ResourceDimension.PUBDATA]
      case BundleKind.PROVE:
        return PROVE_GAS_PER_BATCH
      case BundleKind.EXECUTE:
        return EXECUTE_GAS_PER_BATCH
    }
  }

  /** Calldata bytes one batch adds; `proofBytes` is the proof length for prove bundles. */
  batchSize(kind: BundleKind, proofBytes = 0): number {
    switch (kind) {
      case BundleKind.COMMIT:
        return 32 * 5
      case BundleKind.PROVE:
        // element offset + length word + padded body
        return 64 + paddedWords(proofBytes)
      case BundleKind.EXECUTE:
        return 32 * 2
    }
  }

  estimateGas(kind: BundleKind, batches: readonly SealedBatch[]): bigint {
    return batches.reduce((acc, b) => acc + this.batchGas(kind, b), this.baseGas(kind))
  }

  /**
   * Encode calldata for a contiguous run of batches.
   * Prove bundles take one proof per batch; missing proofs encode as empty bytes.
   */
  encode(kind: BundleKind, batches: readonly SealedBatch[], proofs: readonly string[] = []): string {
    if (batches.length === 0) throw new Error('cannot encode an empty bundle')
    const first = batches[0].batchNumber
    const last = batches[batches.length - 1].batchNumber
    switch (kind) {
      case BundleKind.COMMIT:
        return iface.encodeFunctionData('commitBatches', [
          first,
          last,
          batches.map(b => [b.batchNumber, b.stateRoot, b.txCount, b.usage[ResourceDimension.PUBDATA], b.usage[ResourceDimension.GAS]]),
        ])
      case BundleKind.PROVE:
        return iface.encodeFunctionData('proveBatches', [first, last, batches.map((_, i) => proofs[i] ?? '0x')])
      case BundleKind.EXECUTE:
        return iface.encodeFunctionData('executeBatches', [first, last, batches.map(b => [b.batchNumber, b.stateRoot])])
    }
  }

  static payloadSize(payload: string): number {
    return dataLength(payload)
  }

  static decode(payload: string) {
    const parsed = iface.parseTransaction({ data: payload })
    if (!parsed) throw new Error('unknown executor calldata')
    return { name: parsed.name, firstBatch: Number(parsed.args[0]), lastBatch: Number(parsed.args[1]) }
  }
}
