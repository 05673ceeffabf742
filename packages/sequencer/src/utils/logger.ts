import pino from 'pino'

type TransitionPayload = {
  /** bundle id, or `batch:<n>` for batch transitions */
  subject: string
  kind?: string
  from: string
  to: string
  reason_code?: string
  first_batch?: number
  last_batch?: number
  tx_hash?: string
  ts?: string
}

type RejectionPayload = {
  txHash: string
  reason_code: string
  dimension?: string
  projected?: string
  threshold?: string
}

type SealPayload = {
  batchNumber: number
  primary: string
  triggers: readonly string[]
  txCount: number
  miniblocks: number
  usage: Record<string, string>
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

type LogFields = Record<string, unknown>

export interface ComponentLogger {
  fatal(fields: LogFields): void
  error(fields: LogFields): void
  warn(fields: LogFields): void
  info(fields: LogFields): void
  debug(fields: LogFields): void
}

// resolved on every call so a logger swapped in via setLogger also reaches module-level component loggers
export function getLogger(component: string): ComponentLogger {
  const current = () => logger.child({ component })
  return {
    fatal: fields => current().fatal(fields),
    error: fields => current().error(fields),
    warn: fields => current().warn(fields),
    info: fields => current().info(fields),
    debug: fields => current().debug(fields),
  }
}

export function logTransition(payload: TransitionPayload): void {
  const ts = payload.ts ?? new Date().toISOString()
  const base = {
    event: 'bundle.transition',
    subject: payload.subject,
    kind: payload.kind,
    from: payload.from,
    to: payload.to,
    reason_code: payload.reason_code,
    first_batch: payload.first_batch,
    last_batch: payload.last_batch,
    tx_hash: payload.tx_hash,
    ts
  }

  if (payload.to === 'FAILED') logger.error(base)
  else logger.info(base)
}

export function logRejection(payload: RejectionPayload): void {
  logger.warn({ event: 'tx.rejected', ...payload })
}

export function logSeal(payload: SealPayload): void {
  logger.info({ event: 'batch.sealed', ...payload })
}
