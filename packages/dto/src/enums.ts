export enum ResourceDimension {
  GAS = "GAS",
  DATA_SIZE = "DATA_SIZE",
  GEOMETRY = "GEOMETRY",
  PUBDATA = "PUBDATA",
}

/** Evaluation order of the resource dimensions; also the tie-break order of seal triggers. */
export const RESOURCE_DIMENSIONS: readonly ResourceDimension[] = [
  ResourceDimension.GAS,
  ResourceDimension.DATA_SIZE,
  ResourceDimension.GEOMETRY,
  ResourceDimension.PUBDATA,
]

export enum SealTrigger {
  DEADLINE = "DEADLINE",
  GAS = "GAS",
  DATA_SIZE = "DATA_SIZE",
  GEOMETRY = "GEOMETRY",
  PUBDATA = "PUBDATA",
  SLOTS = "SLOTS",
}

export const SEAL_TRIGGER_ORDER: readonly SealTrigger[] = [
  SealTrigger.DEADLINE,
  SealTrigger.GAS,
  SealTrigger.DATA_SIZE,
  SealTrigger.GEOMETRY,
  SealTrigger.PUBDATA,
  SealTrigger.SLOTS,
]

export enum BatchState {
  OPEN = "OPEN",
  SEALING = "SEALING",
  SEALED = "SEALED",
}

export enum MiniblockState {
  OPEN = "OPEN",
  SEALED = "SEALED",
}

export enum BundleKind {
  COMMIT = "COMMIT",
  PROVE = "PROVE",
  EXECUTE = "EXECUTE",
}

/** Dependency order: a batch is committed, then proven, then executed. */
export const BUNDLE_KIND_ORDER: readonly BundleKind[] = [BundleKind.COMMIT, BundleKind.PROVE, BundleKind.EXECUTE]

export enum BundleState {
  PENDING = "PENDING",
  SUBMITTED = "SUBMITTED",
  CONFIRMED = "CONFIRMED",
  FAILED = "FAILED",
}

export enum ProofSendingMode {
  ONLY_REAL_PROOFS = "OnlyRealProofs",
  SKIP_EVERY_PROOF = "SkipEveryProof",
}

export enum ProofLoadingMode {
  OLD_PROOF_FROM_DB = "OldProofFromDb",
  FRI_PROOF_FROM_GCS = "FriProofFromGcs",
}

export enum ReasonCategory {
  REJECT = "REJECT",
  SEAL = "SEAL",
  AGGREGATION = "AGGREGATION",
  PROOF = "PROOF",
  SUBMIT = "SUBMIT",
  NETWORK = "NETWORK",
  CONFIG = "CONFIG",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "REJECT_SINGLE_TX_GAS"
  | "REJECT_GAS_LIMIT"
  | "REJECT_DATA_SIZE"
  | "REJECT_TX_TOO_LARGE"
  | "REJECT_GEOMETRY"
  | "REJECT_PUBDATA"
  | "REJECT_FEE_TOO_LOW"
  | "SEAL_PERSIST_FAILED"
  | "SEAL_HALTED"
  | "SEAL_BATCH_GAP"
  | "AGGREGATION_OVERFLOW"
  | "PROOF_UNAVAILABLE"
  | "SUBMIT_TIMEOUT"
  | "SUBMIT_REVERTED"
  | "SUBMIT_REJECTED"
  | "NETWORK_RPC_UNAVAILABLE"
  | "CONFIG_INVALID"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  /** true when the condition resolves without operator action */
  recoverable: boolean;
  message: string;
  context?: Record<string, string | number | boolean>;
}
