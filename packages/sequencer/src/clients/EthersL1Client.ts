import { JsonRpcProvider, Network, Transaction, type TransactionLike, Wallet } from 'ethers'
import { z } from 'zod'
import type { EIP1559Request, FeeEstimate, L1Client, L1Receipt, SignedTx } from './L1Client'

export type EthersL1ClientOptions = {
  web3Url: string
  chainId: number
  privateKey: string
  /** read base and priority fee from linea_estimateGas instead of the latest block */
  useLineaEstimateGas?: boolean
}

const hexQuantity = z.string().regex(/^0x[0-9a-fA-F]+$/).transform(v => BigInt(v))

const LineaEstimateSchema = z.object({
  baseFeePerGas: hexQuantity,
  gasLimit: hexQuantity,
  priorityFeePerGas: hexQuantity,
})

export class EthersL1Client implements L1Client {
  private readonly provider: JsonRpcProvider
  private readonly wallet: Wallet
  private readonly chainId: bigint
  private readonly useLinea: boolean

  constructor(opts: EthersL1ClientOptions, provider?: JsonRpcProvider) {
    this.provider = provider ?? new JsonRpcProvider(opts.web3Url, Network.from(opts.chainId), { staticNetwork: true })
    this.wallet = new Wallet(opts.privateKey, this.provider)
    this.chainId = BigInt(opts.chainId)
    this.useLinea = opts.useLineaEstimateGas ?? false
  }

  get address(): string {
    return this.wallet.address
  }

  async getFeeEstimate(): Promise<FeeEstimate> {
    if (this.useLinea) {
      const res: unknown = await this.provider.send('linea_estimateGas', [{ from: this.wallet.address }])
      const parsed = LineaEstimateSchema.parse(res)
      return { baseFeePerGas: parsed.baseFeePerGas, priorityFeePerGas: parsed.priorityFeePerGas }
    }
    const block = await this.provider.getBlock('latest')
    if (!block || block.baseFeePerGas === null) throw new Error('latest block carries no base fee')
    return { baseFeePerGas: block.baseFeePerGas }
  }

  getPendingNonce(): Promise<number> {
    return this.provider.getTransactionCount(this.wallet.address, 'pending')
  }

  getBlockNumber(): Promise<number> {
    return this.provider.getBlockNumber()
  }

  async signTransaction(req: EIP1559Request): Promise<SignedTx> {
    const tx: TransactionLike = {
      type: 2,
      chainId: this.chainId,
      to: req.to,
      nonce: req.nonce,
      gasLimit: req.gasLimit,
      maxFeePerGas: req.maxFeePerGas,
      maxPriorityFeePerGas: req.maxPriorityFeePerGas,
      value: 0n,
      data: req.data
    }
    const raw = await this.wallet.signTransaction(tx)
    // round-trip to catch malformed encodings before broadcast
    const parsed = Transaction.from(raw)
    if (parsed.type !== 2 || !parsed.hash) throw new Error('EthersL1Client: not a signed type-2 transaction')
    return { raw, hash: parsed.hash }
  }

  async broadcast(raw: string): Promise<string> {
    const res = await this.provider.broadcastTransaction(raw)
    return res.hash
  }

  async getReceipt(hash: string): Promise<L1Receipt | null> {
    const receipt = await this.provider.getTransactionReceipt(hash)
    if (!receipt) return null
    return {
      txHash: receipt.hash,
      blockNumber: receipt.blockNumber,
      status: receipt.status ?? 0,
      gasUsed: receipt.gasUsed
    }
  }

  destroy(): void {
    this.provider.destroy()
  }
}
