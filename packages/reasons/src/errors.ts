/**
 * Error taxonomy of the pipeline.
 * Every error wraps a ReasonDetail so callers, logs and metrics see the same stable code.
 */
import { ReasonDetail, ResourceDimension } from '@sealkeeper/dto'

export class PipelineError extends Error {
  public readonly reason: ReasonDetail

  constructor(reason: ReasonDetail, human?: string) {
    super(human ?? reason.message)
    this.name = 'PipelineError'
    this.reason = reason
  }

  get code() {
    return this.reason.code
  }
}

/** Returned to the submitter; the batch is left untouched. */
export class TransactionRejected extends PipelineError {
  public readonly txHash: string
  public readonly dimension?: ResourceDimension

  constructor(reason: ReasonDetail, txHash: string, dimension?: ResourceDimension) {
    super(reason)
    this.name = 'TransactionRejected'
    this.txHash = txHash
    this.dimension = dimension
  }
}

/** Fatal: admission stays halted until the state keeper is resumed. */
export class SealingInvariantViolation extends PipelineError {
  public readonly terminal = true as const

  constructor(reason: ReasonDetail, human?: string) {
    super(reason, human)
    this.name = 'SealingInvariantViolation'
  }
}

export class ProofUnavailable extends PipelineError {
  public readonly batchNumber: number

  constructor(reason: ReasonDetail, batchNumber: number) {
    super(reason)
    this.name = 'ProofUnavailable'
    this.batchNumber = batchNumber
  }
}

export class SubmissionTimeout extends PipelineError {
  public readonly bundleId: string

  constructor(reason: ReasonDetail, bundleId: string) {
    super(reason)
    this.name = 'SubmissionTimeout'
    this.bundleId = bundleId
  }
}

export class SubmissionReverted extends PipelineError {
  public readonly bundleId: string
  public readonly txHash: string

  constructor(reason: ReasonDetail, bundleId: string, txHash: string) {
    super(reason)
    this.name = 'SubmissionReverted'
    this.bundleId = bundleId
    this.txHash = txHash
  }
}

export class ConfigurationError extends PipelineError {
  public readonly issues: string[]

  constructor(reason: ReasonDetail, issues: string[]) {
    super(reason, `${reason.message}: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}
