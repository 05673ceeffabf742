import type { AggregatedTxBundle, SealedBatch, TxCost } from '@sealkeeper/dto'
import { PipelineError, shouldRetry } from '@sealkeeper/reasons'
import type { L1Client } from '../clients/L1Client'
import type { PipelineConfig } from '../config'
import { getLogger } from '../utils/logger'
import { AggregatorStatus, BatchAggregator } from '../services/BatchAggregator'
import { GasAdjuster } from '../services/GasAdjuster'
import { L1Sender, TxHandle } from '../services/L1Sender'
import { NonceManager } from '../services/NonceManager'
import { ProofSource, ProofStore, resolveProofMode } from '../services/ProofGate'
import { InMemorySealedBatchStore, SealedBatchStore, StateRootProvider } from '../services/SealedBatchStore'
import { AdmissionResult, StateKeeper, TickResult } from '../services/StateKeeper'

const log = getLogger('pipeline')

export type PipelineDeps = {
  config: PipelineConfig
  client: L1Client
  stateRoots: StateRootProvider
  store?: SealedBatchStore
  proofSource?: ProofSource
  proofStore?: ProofStore
  clock?: () => number
}

type TimerPass = 'tick' | 'aggregate' | 'poll'

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Pipeline
 * Wires state keeper -> store -> aggregator -> gas adjuster -> sender, and owns every timer.
 */
export class Pipeline {
  readonly stateKeeper: StateKeeper
  readonly aggregator: BatchAggregator
  readonly gas: GasAdjuster
  readonly sender: L1Sender
  readonly store: SealedBatchStore
  private readonly config: PipelineConfig
  private readonly clock: () => number
  private timers: NodeJS.Timeout[] = []
  // timer passes still running; a pass due while its previous run is busy is skipped
  private readonly running: Set<TimerPass> = new Set()

  private constructor(deps: PipelineDeps, store: SealedBatchStore, stateKeeper: StateKeeper) {
    const { config, client } = deps
    this.config = config
    this.clock = deps.clock ?? Date.now
    this.store = store
    this.stateKeeper = stateKeeper

    const proofMode = resolveProofMode(config.ethSender.proofSendingMode, config.ethSender.proofLoadingMode, {
      source: deps.proofSource,
      store: deps.proofStore,
    })
    this.aggregator = new BatchAggregator({
      limits: config.ethSender,
      proofMode,
      firstBatchNumber: config.stateKeeper.firstBatchNumber,
    })
    this.gas = new GasAdjuster(config.gasAdjuster, client)
    this.sender = new L1Sender({
      limits: config.ethSender,
      target: config.contracts.validatorTimelockAddr,
      client,
      gas: this.gas,
      nonces: new NonceManager(client),
      listener: this.aggregator,
    })

    this.stateKeeper.on('batch.sealed', (batch: SealedBatch) => this.aggregator.enqueue(batch))
  }

  /** Builds the pipeline and hands already persisted batches to the aggregator. */
  static async create(deps: PipelineDeps): Promise<Pipeline> {
    const store = deps.store ?? new InMemorySealedBatchStore()
    const stateKeeper = await StateKeeper.fromStore({
      config: deps.config.stateKeeper,
      store,
      stateRoots: deps.stateRoots,
      clock: deps.clock,
    })
    const pipeline = new Pipeline(deps, store, stateKeeper)
    const persisted = await store.since(deps.config.stateKeeper.firstBatchNumber)
    for (const batch of persisted) pipeline.aggregator.enqueue(batch)
    if (persisted.length) log.info({ event: 'pipeline.replayed', batches: persisted.length })
    return pipeline
  }

  submit(cost: TxCost): Promise<AdmissionResult> {
    return this.stateKeeper.submit(cost)
  }

  tick(): Promise<TickResult> {
    return this.stateKeeper.tick()
  }

  /** Form ready bundles and send everything pending. */
  async aggregateOnce(): Promise<TxHandle[]> {
    const now = this.clock()
    await this.aggregator.aggregate(now)
    return this.sender.sendPending(this.aggregator.pending(), now)
  }

  pollOnce(): Promise<void> {
    return this.sender.pollOnce(this.clock())
  }

  retryFailed(bundleId: string): AggregatedTxBundle {
    return this.aggregator.retryFailed(bundleId, this.clock())
  }

  status(): AggregatorStatus & { halted: boolean } {
    return { ...this.aggregator.status(), halted: this.stateKeeper.isHalted }
  }

  start(): void {
    if (this.timers.length) return
    const sk = this.config.stateKeeper
    const tickPeriod = Math.max(10, Math.floor(Math.min(sk.miniblockCommitDeadlineMs, sk.blockCommitDeadlineMs) / 2))

    this.timers.push(
      setInterval(() => {
        if (this.stateKeeper.isHalted) return
        this.runExclusive('tick', () => this.tick())
      }, tickPeriod),
      setInterval(() => this.runExclusive('aggregate', () => this.aggregateOnce()), this.config.ethSender.aggregateTxPollPeriodMs),
      setInterval(() => this.runExclusive('poll', () => this.pollOnce()), this.config.ethSender.txPollPeriodMs),
    )
    this.gas.start()
    log.info({ event: 'pipeline.started', tickPeriod })
  }

  private runExclusive(pass: TimerPass, run: () => Promise<unknown>): void {
    if (this.running.has(pass)) {
      log.debug({ event: 'pipeline.pass_skipped', pass })
      return
    }
    this.running.add(pass)
    void run()
      .catch(err => {
        // the next pass retries either way; anything but a retryable code needs an operator
        const retryable = err instanceof PipelineError && shouldRetry(err.code)
        const entry = { event: `pipeline.${pass}_failed`, err: errMessage(err), retryable }
        if (retryable) log.warn(entry)
        else log.error(entry)
      })
      .finally(() => this.running.delete(pass))
  }

  stop(): void {
    for (const t of this.timers) clearInterval(t)
    this.timers = []
    this.gas.stop()
    log.info({ event: 'pipeline.stopped', inFlight: this.sender.tracked().length })
  }
}
