import { EventEmitter } from 'events'
import { AggregatedTxBundle, BundleFees, BundleState, ReasonCode } from '@sealkeeper/dto'
import { PipelineError, SubmissionReverted, SubmissionTimeout, reason } from '@sealkeeper/reasons'
import type { L1Client, SignedTx } from '../clients/L1Client'
import type { EthSenderConfig } from '../config'
import { bundleMachine } from '../fsm/stateMachine'
import { getLogger, logTransition } from '../utils/logger'
import { countTransition } from '../utils/metrics'
import { Mutex } from '../utils/mutex'
import type { BundleListener } from './BatchAggregator'
import { ErrorAction, ErrorClassifier } from './ErrorClassifier'
import type { GasAdjuster } from './GasAdjuster'
import type { NonceManager } from './NonceManager'

const log = getLogger('l1-sender')

/** gas limit = estimate * 120% */
const GAS_LIMIT_NUMERATOR = 120n
const GAS_LIMIT_DENOMINATOR = 100n

export type SenderLimits = Pick<EthSenderConfig, 'txInclusionTimeoutMs' | 'maxFeeBumps' | 'waitConfirmations'>

export type TxHandle = {
  bundleId: string
  txHash: string
  nonce: number
}

export type L1SenderOptions = {
  limits: SenderLimits
  /** executor contract receiving every bundle */
  target: string
  client: L1Client
  gas: GasAdjuster
  nonces: NonceManager
  listener: BundleListener
}

export type BundleFailedEvent = { bundle: AggregatedTxBundle; error: PipelineError }

/**
 * L1Sender
 * - Sends pending bundles in formation order, one nonce each
 * - Polls receipts, confirms after the configured depth, replaces stuck txs with bumped fees
 * - Every bundle ends Confirmed or Failed; failures are emitted as 'bundle.failed'
 * - Send and poll passes share one FIFO mutex, so a bundle is never sent or replaced by two passes at once
 */
export class L1Sender extends EventEmitter {
  private readonly limits: SenderLimits
  private readonly target: string
  private readonly client: L1Client
  private readonly gas: GasAdjuster
  private readonly nonces: NonceManager
  private readonly listener: BundleListener
  private readonly submitted: Map<string, AggregatedTxBundle> = new Map()
  private readonly mutex = new Mutex()

  constructor(opts: L1SenderOptions) {
    super()
    this.limits = opts.limits
    this.target = opts.target
    this.client = opts.client
    this.gas = opts.gas
    this.nonces = opts.nonces
    this.listener = opts.listener
  }

  /** Bundles awaiting a receipt. */
  tracked(): AggregatedTxBundle[] {
    return [...this.submitted.values()]
  }

  /**
   * Send pending bundles in order. Stops at the first bundle that could not be sent,
   * since later nonces would only queue behind it.
   */
  sendPending(bundles: readonly AggregatedTxBundle[], now: number = Date.now()): Promise<TxHandle[]> {
    return this.mutex.run(async () => {
      const handles: TxHandle[] = []
      for (const bundle of bundles) {
        if (bundle.state !== BundleState.PENDING) continue
        const handle = await this.send(bundle, now)
        if (handle) handles.push(handle)
        else if (bundle.state === BundleState.PENDING) break
      }
      return handles
    })
  }

  submit(bundle: AggregatedTxBundle, now: number = Date.now()): Promise<TxHandle | undefined> {
    return this.mutex.run(() => this.send(bundle, now))
  }

  private async send(bundle: AggregatedTxBundle, now: number): Promise<TxHandle | undefined> {
    if (bundle.state !== BundleState.PENDING) throw new Error(`bundle ${bundle.id} is ${bundle.state}, expected PENDING`)
    if (bundle.nonce === undefined) bundle.nonce = await this.nonces.reserveNonce(bundle.id)
    const fees = bundle.fees ?? (await this.gas.feesFor())
    return this.attempt(bundle, fees, now)
  }

  private gasLimitOf(bundle: AggregatedTxBundle): bigint {
    return (bundle.estimatedGas * GAS_LIMIT_NUMERATOR) / GAS_LIMIT_DENOMINATOR
  }

  private sign(bundle: AggregatedTxBundle, nonce: number, fees: BundleFees): Promise<SignedTx> {
    return this.client.signTransaction({
      to: this.target,
      nonce,
      gasLimit: this.gasLimitOf(bundle),
      maxFeePerGas: fees.maxFeePerGas,
      maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
      data: bundle.payload,
    })
  }

  /**
   * Sign and broadcast one attempt. Underpriced attempts are re-priced in place, bounded by maxFeeBumps.
   */
  private async attempt(bundle: AggregatedTxBundle, initialFees: BundleFees, now: number): Promise<TxHandle | undefined> {
    let fees = initialFees
    let nonceRefreshed = false
    for (let tries = 0; tries <= this.limits.maxFeeBumps; tries++) {
      if (bundle.nonce === undefined) bundle.nonce = await this.nonces.reserveNonce(bundle.id)
      const nonce = bundle.nonce
      const signed = await this.sign(bundle, nonce, fees)
      try {
        await this.client.broadcast(signed.raw)
        return this.recordAttempt(bundle, signed, fees, now)
      } catch (err) {
        const classification = ErrorClassifier.classifyError(err)
        const message = err instanceof Error ? err.message : String(err)
        log.warn({ event: 'bundle.send_error', bundleId: bundle.id, nonce, action: classification.action, err: message })
        switch (classification.action) {
          case ErrorAction.ACCEPT_SUCCESS:
            return this.recordAttempt(bundle, signed, fees, now)
          case ErrorAction.BUMP_FEE_RETRY:
            fees = await this.gas.feesFor(fees)
            continue
          case ErrorAction.REFRESH_NONCE_RESCHEDULE:
            // a replacement hitting "nonce too low" means an earlier attempt was mined; the poll will see it
            if (bundle.state === BundleState.SUBMITTED || nonceRefreshed) return undefined
            nonceRefreshed = true
            this.nonces.release(nonce)
            await this.nonces.refreshFromChain()
            bundle.nonce = undefined
            continue
          case ErrorAction.BACKOFF_RETRY:
            return undefined
          case ErrorAction.HARD_FAIL:
            if (bundle.state === BundleState.SUBMITTED) return this.replacementRefused(bundle, classification.code, now)
            await this.fail(bundle, new PipelineError(reason(classification.code, { message: classification.reason, context: { bundleId: bundle.id } })), now)
            return undefined
        }
      }
    }
    if (bundle.state === BundleState.SUBMITTED) return this.replacementRefused(bundle, 'SUBMIT_REJECTED', now)
    await this.fail(bundle, new PipelineError(reason('SUBMIT_REJECTED', { message: 'Replacement still underpriced after the maximum number of fee bumps', context: { bundleId: bundle.id } })), now)
    return undefined
  }

  /**
   * A refused replacement leaves the earlier txs on the wire: keep polling their hashes.
   * The refusal still uses one bump, so the inclusion timeout ends a bundle that never lands.
   */
  private replacementRefused(bundle: AggregatedTxBundle, code: ReasonCode, now: number): undefined {
    bundle.attempts += 1
    bundle.lastAttemptAt = now
    log.warn({ event: 'bundle.replacement_refused', bundleId: bundle.id, nonce: bundle.nonce, reason_code: code, attempts: bundle.attempts })
    return undefined
  }

  private recordAttempt(bundle: AggregatedTxBundle, signed: SignedTx, fees: BundleFees, now: number): TxHandle {
    const from = bundle.state
    const nonce = bundle.nonce ?? -1
    bundleMachine.assert(from, BundleState.SUBMITTED, `bundle ${bundle.id}`)
    bundle.state = BundleState.SUBMITTED
    bundle.fees = fees
    bundle.attempts += 1
    if (!bundle.txHashes.includes(signed.hash)) bundle.txHashes.push(signed.hash)
    bundle.submittedAt = bundle.submittedAt ?? now
    bundle.lastAttemptAt = now
    this.nonces.markBroadcast(nonce, signed.hash)
    this.submitted.set(bundle.id, bundle)
    logTransition({ subject: bundle.id, kind: bundle.kind, from, to: BundleState.SUBMITTED, first_batch: bundle.firstBatch, last_batch: bundle.lastBatch, tx_hash: signed.hash })
    countTransition(bundle.kind, from, BundleState.SUBMITTED)
    return { bundleId: bundle.id, txHash: signed.hash, nonce }
  }

  /**
   * One pass over submitted bundles: confirm, fail on revert, or replace after the inclusion timeout.
   */
  pollOnce(now: number = Date.now()): Promise<void> {
    return this.mutex.run(async () => {
      if (this.submitted.size === 0) return
      const head = await this.client.getBlockNumber()
      for (const bundle of [...this.submitted.values()]) {
        try {
          await this.pollBundle(bundle, head, now)
        } catch (err) {
          log.warn({ event: 'bundle.poll_error', bundleId: bundle.id, err: err instanceof Error ? err.message : String(err) })
        }
      }
    })
  }

  private async pollBundle(bundle: AggregatedTxBundle, head: number, now: number): Promise<void> {
    for (const hash of bundle.txHashes) {
      const receipt = await this.client.getReceipt(hash)
      if (!receipt) continue
      if (receipt.status !== 1) {
        await this.fail(bundle, new SubmissionReverted(reason('SUBMIT_REVERTED', { context: { bundleId: bundle.id, txHash: hash } }), bundle.id, hash), now)
        return
      }
      const confirmations = head - receipt.blockNumber + 1
      if (confirmations >= this.limits.waitConfirmations) this.confirm(bundle, hash, now)
      return
    }

    const since = bundle.lastAttemptAt ?? bundle.createdAt
    if (now - since < this.limits.txInclusionTimeoutMs) return

    const bumps = bundle.attempts - 1
    if (bumps >= this.limits.maxFeeBumps) {
      await this.fail(bundle, new SubmissionTimeout(reason('SUBMIT_TIMEOUT', { context: { bundleId: bundle.id, attempts: bundle.attempts } }), bundle.id), now)
      return
    }
    const previous = bundle.fees
    const fees = await this.gas.feesFor(previous)
    log.info({
      event: 'bundle.replaced',
      bundleId: bundle.id,
      nonce: bundle.nonce,
      attempt: bundle.attempts + 1,
      maxFeePerGas: fees.maxFeePerGas.toString(),
      maxPriorityFeePerGas: fees.maxPriorityFeePerGas.toString(),
    })
    await this.attempt(bundle, fees, now)
  }

  private confirm(bundle: AggregatedTxBundle, txHash: string, now: number): void {
    bundleMachine.assert(bundle.state, BundleState.CONFIRMED, `bundle ${bundle.id}`)
    const from = bundle.state
    bundle.state = BundleState.CONFIRMED
    bundle.confirmedAt = now
    this.submitted.delete(bundle.id)
    if (bundle.nonce !== undefined) this.nonces.release(bundle.nonce)
    logTransition({ subject: bundle.id, kind: bundle.kind, from, to: BundleState.CONFIRMED, first_batch: bundle.firstBatch, last_batch: bundle.lastBatch, tx_hash: txHash })
    countTransition(bundle.kind, from, BundleState.CONFIRMED)
    this.listener.onConfirmed(bundle)
    this.emit('bundle.confirmed', bundle)
  }

  private async fail(bundle: AggregatedTxBundle, error: PipelineError, now: number): Promise<void> {
    bundleMachine.assert(bundle.state, BundleState.FAILED, `bundle ${bundle.id}`)
    const from = bundle.state
    bundle.state = BundleState.FAILED
    bundle.failure = error.code
    bundle.lastAttemptAt = bundle.lastAttemptAt ?? now
    this.submitted.delete(bundle.id)
    logTransition({ subject: bundle.id, kind: bundle.kind, from, to: BundleState.FAILED, reason_code: error.code, first_batch: bundle.firstBatch, last_batch: bundle.lastBatch })
    countTransition(bundle.kind, from, BundleState.FAILED)
    if (bundle.nonce !== undefined) {
      this.nonces.release(bundle.nonce)
      // the nonce may never land on chain; later bundles must not queue behind it
      if (error.code !== 'SUBMIT_REVERTED') await this.nonces.refreshFromChain()
    }
    this.listener.onFailed(bundle)
    const event: BundleFailedEvent = { bundle, error }
    this.emit('bundle.failed', event)
  }
}
