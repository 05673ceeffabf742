import type { BundleFees } from '@sealkeeper/dto'
import {
  PRIORITY_FEE_STRATEGIES,
  type PriorityFeeStrategy,
  computeMaxFee,
  maxBig,
  minBig,
  replacementFees,
} from '@sealkeeper/math'
import type { L1Client } from '../clients/L1Client'
import type { GasAdjusterConfig } from '../config'
import { getLogger } from '../utils/logger'
import { setPriorityFee } from '../utils/metrics'

const log = getLogger('gas-adjuster')

/**
 * GasAdjuster
 * - Keeps a bounded window of observed base fees (oldest first)
 * - Prices new submissions and replacements; replacements never go below the bump floor
 */
export class GasAdjuster {
  private samples: bigint[] = []
  private nodeHint?: bigint
  private timer?: NodeJS.Timeout
  private readonly strategy: PriorityFeeStrategy

  constructor(
    private readonly config: GasAdjusterConfig,
    private readonly client: L1Client,
    strategy?: PriorityFeeStrategy,
  ) {
    this.strategy = strategy ?? PRIORITY_FEE_STRATEGIES[config.strategy]()
  }

  observe(baseFee: bigint): void {
    if (baseFee < 0n) throw new RangeError(`negative base fee ${baseFee}`)
    this.samples.push(baseFee)
    if (this.samples.length > this.config.maxBaseFeeSamples) {
      this.samples.splice(0, this.samples.length - this.config.maxBaseFeeSamples)
    }
  }

  async poll(): Promise<bigint> {
    const estimate = await this.client.getFeeEstimate()
    this.nodeHint = estimate.priorityFeePerGas
    this.observe(estimate.baseFeePerGas)
    log.debug({ event: 'gas.sampled', baseFee: estimate.baseFeePerGas.toString(), window: this.samples.length })
    return estimate.baseFeePerGas
  }

  window(): readonly bigint[] {
    return [...this.samples]
  }

  latestBaseFee(): bigint | undefined {
    return this.samples[this.samples.length - 1]
  }

  currentPriorityFee(): bigint {
    const { defaultPriorityFeePerGas, maxAcceptablePriorityFee } = this.config
    let fee = this.strategy.priorityFee({ samples: this.samples, defaultFee: defaultPriorityFeePerGas })
    if (this.nodeHint !== undefined) fee = maxBig(fee, this.nodeHint)
    const clamped = minBig(maxBig(fee, defaultPriorityFeePerGas), maxAcceptablePriorityFee)
    setPriorityFee(clamped)
    return clamped
  }

  /**
   * Fees for a new submission, or for a replacement of `previous`.
   * Replacement fees ignore the acceptable-priority cap: inclusion of a stuck nonce wins over price.
   */
  async feesFor(previous?: BundleFees): Promise<BundleFees> {
    let base = this.latestBaseFee()
    if (base === undefined) base = await this.poll()
    const maxPriorityFeePerGas = this.currentPriorityFee()
    const proposed = { maxFeePerGas: computeMaxFee(base, maxPriorityFeePerGas), maxPriorityFeePerGas }
    return previous ? replacementFees(previous, proposed) : proposed
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.poll().catch(err => log.warn({ event: 'gas.poll_failed', err: err instanceof Error ? err.message : String(err) }))
    }, this.config.pollPeriodMs)
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer)
    this.timer = undefined
  }
}
