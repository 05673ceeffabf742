/**
 * Classification of base-chain send errors into sender actions.
 */
import type { ReasonCode } from '@sealkeeper/dto'

export enum ErrorAction {
  ACCEPT_SUCCESS = 'accept_success',           // Treat as submitted (already known)
  BUMP_FEE_RETRY = 'bump_fee_retry',           // Bump fees and retry same nonce
  REFRESH_NONCE_RESCHEDULE = 'refresh_nonce_reschedule', // Refresh nonce and retry
  HARD_FAIL = 'hard_fail',                     // Fail the bundle and surface it
  BACKOFF_RETRY = 'backoff_retry'              // Leave pending for the next poll
}

export interface ErrorClassification {
  action: ErrorAction
  reason: string
  code: ReasonCode
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    const nested = 'error' in error ? error.error : undefined
    const nestedMsg = nested && typeof nested === 'object' && 'message' in nested && typeof nested.message === 'string' ? nested.message : ''
    return `${nestedMsg} ${error.message}`.toLowerCase()
  }
  return String(error).toLowerCase()
}

function numericCode(value: unknown): number | undefined {
  if (value && typeof value === 'object' && 'code' in value && typeof value.code === 'number') return value.code
  return undefined
}

function rpcCodeOf(error: unknown): number | undefined {
  const direct = numericCode(error)
  if (direct !== undefined) return direct
  if (error && typeof error === 'object' && 'error' in error) return numericCode(error.error)
  return undefined
}

export class ErrorClassifier {
  static classifyError(error: unknown): ErrorClassification {
    const msg = messageOf(error)
    const code = rpcCodeOf(error)

    // Already known - transaction is already in mempool
    if (msg.includes('already known') || msg.includes('known transaction')) {
      return { action: ErrorAction.ACCEPT_SUCCESS, reason: 'Transaction already known to network', code: 'SUBMIT_REJECTED' }
    }

    // Replacement underpriced - need higher fees for same nonce
    if (msg.includes('replacement transaction underpriced') || msg.includes('transaction underpriced') || msg.includes('fee too low')) {
      return { action: ErrorAction.BUMP_FEE_RETRY, reason: 'Transaction fees too low for replacement', code: 'SUBMIT_REJECTED' }
    }

    if (msg.includes('nonce too low') || msg.includes('nonce has already been used')) {
      return { action: ErrorAction.REFRESH_NONCE_RESCHEDULE, reason: 'Nonce is too low, needs refresh', code: 'SUBMIT_REJECTED' }
    }

    if (msg.includes('insufficient funds') || msg.includes('not enough funds')) {
      return { action: ErrorAction.HARD_FAIL, reason: 'Insufficient funds in operator wallet', code: 'SUBMIT_REJECTED' }
    }

    // Network congestion or temporary issues
    if (msg.includes('timeout') || msg.includes('network') || msg.includes('econnrefused') || msg.includes('socket hang up') || code === -32005) {
      return { action: ErrorAction.BACKOFF_RETRY, reason: 'Network or timeout issue', code: 'NETWORK_RPC_UNAVAILABLE' }
    }

    // Transient JSON-RPC server errors
    if (code !== undefined && code <= -32000 && code >= -32099) {
      return { action: ErrorAction.BACKOFF_RETRY, reason: `RPC error ${code}`, code: 'NETWORK_RPC_UNAVAILABLE' }
    }

    return { action: ErrorAction.HARD_FAIL, reason: 'Unknown transaction error', code: 'SUBMIT_REJECTED' }
  }
}
