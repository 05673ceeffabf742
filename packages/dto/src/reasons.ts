import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, recoverability, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // REJECT 1xxx
  REJECT_SINGLE_TX_GAS: { code: 'REJECT_SINGLE_TX_GAS', category: ReasonCategory.REJECT, recoverable: true, message: 'Transaction gas exceeds the single transaction limit' },
  REJECT_GAS_LIMIT: { code: 'REJECT_GAS_LIMIT', category: ReasonCategory.REJECT, recoverable: true, message: 'Transaction would exceed the batch gas threshold' },
  REJECT_DATA_SIZE: { code: 'REJECT_DATA_SIZE', category: ReasonCategory.REJECT, recoverable: true, message: 'Transaction would exceed the batch data size threshold' },
  REJECT_TX_TOO_LARGE: { code: 'REJECT_TX_TOO_LARGE', category: ReasonCategory.REJECT, recoverable: true, message: 'Encoded transaction exceeds the maximum transaction size' },
  REJECT_GEOMETRY: { code: 'REJECT_GEOMETRY', category: ReasonCategory.REJECT, recoverable: true, message: 'Transaction would exceed the batch circuit geometry threshold' },
  REJECT_PUBDATA: { code: 'REJECT_PUBDATA', category: ReasonCategory.REJECT, recoverable: true, message: 'Transaction would exceed the batch pubdata threshold' },
  REJECT_FEE_TOO_LOW: { code: 'REJECT_FEE_TOO_LOW', category: ReasonCategory.REJECT, recoverable: true, message: 'Offered gas price is below the minimal L2 gas price' },

  // SEAL 2xxx
  SEAL_PERSIST_FAILED: { code: 'SEAL_PERSIST_FAILED', category: ReasonCategory.SEAL, recoverable: false, message: 'Sealed batch could not be persisted' },
  SEAL_HALTED: { code: 'SEAL_HALTED', category: ReasonCategory.SEAL, recoverable: false, message: 'Admission halted until the pending sealed batch is persisted' },
  SEAL_BATCH_GAP: { code: 'SEAL_BATCH_GAP', category: ReasonCategory.SEAL, recoverable: false, message: 'Sealed batch numbers are not contiguous' },

  // AGGREGATION 3xxx
  AGGREGATION_OVERFLOW: { code: 'AGGREGATION_OVERFLOW', category: ReasonCategory.AGGREGATION, recoverable: true, message: 'Single batch exceeds an aggregation ceiling' },

  // PROOF 4xxx
  PROOF_UNAVAILABLE: { code: 'PROOF_UNAVAILABLE', category: ReasonCategory.PROOF, recoverable: true, message: 'Proof not yet available' },

  // SUBMIT 5xxx
  SUBMIT_TIMEOUT: { code: 'SUBMIT_TIMEOUT', category: ReasonCategory.SUBMIT, recoverable: false, message: 'Transaction not included after the maximum number of fee bumps' },
  SUBMIT_REVERTED: { code: 'SUBMIT_REVERTED', category: ReasonCategory.SUBMIT, recoverable: false, message: 'Transaction reverted on the base chain' },
  SUBMIT_REJECTED: { code: 'SUBMIT_REJECTED', category: ReasonCategory.SUBMIT, recoverable: false, message: 'Transaction rejected by the base chain node' },

  // NETWORK 6xxx
  NETWORK_RPC_UNAVAILABLE: { code: 'NETWORK_RPC_UNAVAILABLE', category: ReasonCategory.NETWORK, recoverable: true, message: 'Upstream RPC unavailable' },

  // CONFIG 8xxx
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: ReasonCategory.CONFIG, recoverable: false, message: 'Invalid configuration' },

  // INTERNAL 9xxx
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, recoverable: false, message: 'Internal error' },
}
