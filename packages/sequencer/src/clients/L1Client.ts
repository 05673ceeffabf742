/**
 * Base-chain transport used by the gas adjuster and the sender.
 */

export type EIP1559Request = {
  to: string
  nonce: number
  gasLimit: bigint
  maxFeePerGas: bigint
  maxPriorityFeePerGas: bigint
  data: string
}

export type SignedTx = {
  raw: string
  hash: string
}

export type L1Receipt = {
  txHash: string
  blockNumber: number
  /** 1 success, 0 reverted */
  status: number
  gasUsed: bigint
}

export type FeeEstimate = {
  baseFeePerGas: bigint
  /** node-suggested tip, when the endpoint offers one */
  priorityFeePerGas?: bigint
}

export interface L1Client {
  readonly address: string
  getFeeEstimate(): Promise<FeeEstimate>
  /** pending-tag transaction count of the operator */
  getPendingNonce(): Promise<number>
  getBlockNumber(): Promise<number>
  signTransaction(req: EIP1559Request): Promise<SignedTx>
  broadcast(raw: string): Promise<string>
  getReceipt(hash: string): Promise<L1Receipt | null>
}
