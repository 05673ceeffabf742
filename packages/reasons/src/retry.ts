/**
 * Retry policy
 * - PROOF_*, NETWORK_* and AGGREGATION_* clear up on a later pass without operator action.
 * - REJECT_* goes back to the submitter; this component never retries it.
 * - SEAL_*, SUBMIT_*, CONFIG_* and INTERNAL_ERROR need an operator.
 */
import { ReasonCategory, ReasonCode } from '@sealkeeper/dto'
import { REASONS } from './registry'

export function shouldRetry(code: ReasonCode): boolean {
  const detail = REASONS[code]
  switch (detail.category) {
    case ReasonCategory.NETWORK:
    case ReasonCategory.PROOF:
    case ReasonCategory.AGGREGATION:
      return true
    default:
      return false
  }
}

