import { Registry, Counter, Gauge } from 'prom-client'

let registry: Registry
let sealCounter: Counter<string>
let rejectionCounter: Counter<string>
let transitionCounter: Counter<string>
let priorityFeeGauge: Gauge<string>
let lastBatchGauge: Gauge<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  sealCounter = new Counter({
    name: 'batches_sealed_total',
    help: 'Sealed batches by primary seal trigger',
    labelNames: ['reason'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'tx_rejections_total',
    help: 'Rejected transactions by reason and dimension',
    labelNames: ['reason', 'dimension'],
    registers: [registry]
  })

  transitionCounter = new Counter({
    name: 'bundle_transitions_total',
    help: 'Bundle state transitions by kind',
    labelNames: ['kind', 'from', 'to'],
    registers: [registry]
  })

  priorityFeeGauge = new Gauge({
    name: 'priority_fee_wei',
    help: 'Current priority fee chosen by the gas adjuster (wei)',
    registers: [registry]
  })

  lastBatchGauge = new Gauge({
    name: 'last_batch_number',
    help: 'Highest batch number per stage',
    labelNames: ['stage'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countSeal(reason: string) {
  sealCounter.labels({ reason }).inc()
}

export function countRejection(reason: string, dimension = 'none') {
  rejectionCounter.labels({ reason, dimension }).inc()
}

export function countTransition(kind: string, from: string, to: string) {
  transitionCounter.labels({ kind, from, to }).inc()
}

// gauges take numbers; wei values far above 2^53 lose precision, which is acceptable for a gauge
export function setPriorityFee(wei: bigint) {
  priorityFeeGauge.set(Number(wei))
}

export function setLastBatch(stage: string, batchNumber: number) {
  lastBatchGauge.labels({ stage }).set(batchNumber)
}
