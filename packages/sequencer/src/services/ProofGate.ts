/**
 * Proof gating for prove and execute bundles.
 * The mode is a tagged union resolved once from config; `gate` is the single dispatch point.
 */
import { BundleKind, ProofLoadingMode, ProofSendingMode, ReasonDetail } from '@sealkeeper/dto'
import { ConfigurationError, ProofUnavailable, reason } from '@sealkeeper/reasons'

/** Availability signal of the prover that writes proofs next to the node. */
export interface ProofSource {
  isProofReady(batchNumber: number): Promise<boolean>
  /** proof bytes, when the source can hand them over */
  loadProof?(batchNumber: number): Promise<string | null>
}

export interface ProofStore {
  loadProof(batchNumber: number): Promise<string | null>
}

export type ProofMode =
  | { kind: 'real'; source: ProofSource }
  | { kind: 'skip' }
  | { kind: 'store'; store: ProofStore }

export type BatchProgress = {
  commitConfirmed: boolean
  proveFormed: boolean
  proveConfirmed: boolean
}

export type GateDecision =
  | { open: true; proof: string }
  | { open: false; reason: ReasonDetail }

export function resolveProofMode(
  sending: ProofSendingMode,
  loading: ProofLoadingMode,
  deps: { source?: ProofSource; store?: ProofStore },
): ProofMode {
  if (sending === ProofSendingMode.SKIP_EVERY_PROOF) return { kind: 'skip' }
  if (loading === ProofLoadingMode.FRI_PROOF_FROM_GCS) {
    if (!deps.store) throw new ConfigurationError(reason('CONFIG_INVALID'), ['FriProofFromGcs requires PROOF_STORE_URL'])
    return { kind: 'store', store: deps.store }
  }
  if (!deps.source) throw new ConfigurationError(reason('CONFIG_INVALID'), ['OnlyRealProofs requires a proof source'])
  return { kind: 'real', source: deps.source }
}

export function requiresRealProofs(mode: ProofMode): boolean {
  return mode.kind !== 'skip'
}

function closed(code: 'PROOF_UNAVAILABLE' | 'NETWORK_RPC_UNAVAILABLE', batchNumber: number, cause?: string): GateDecision {
  return { open: false, reason: reason(code, { context: cause ? { batchNumber, cause } : { batchNumber } }) }
}

async function loadProofBytes(mode: ProofMode, batchNumber: number): Promise<string | null> {
  switch (mode.kind) {
    case 'skip':
      return '0x'
    case 'store':
      return mode.store.loadProof(batchNumber)
    case 'real': {
      if (!(await mode.source.isProofReady(batchNumber))) return null
      if (!mode.source.loadProof) return '0x'
      return mode.source.loadProof(batchNumber)
    }
  }
}

/**
 * Decide whether `batchNumber` may join a bundle of `kind`.
 * Commit is never gated. Prove additionally needs its commit confirmed; that check belongs to the caller.
 */
export async function gate(mode: ProofMode, kind: BundleKind, batchNumber: number, progress: BatchProgress): Promise<GateDecision> {
  switch (kind) {
    case BundleKind.COMMIT:
      return { open: true, proof: '0x' }
    case BundleKind.PROVE: {
      let proof: string | null
      try {
        proof = await loadProofBytes(mode, batchNumber)
      } catch (err) {
        if (err instanceof ProofUnavailable) return closed('PROOF_UNAVAILABLE', batchNumber, err.message)
        return closed('NETWORK_RPC_UNAVAILABLE', batchNumber, err instanceof Error ? err.message : String(err))
      }
      return proof === null ? closed('PROOF_UNAVAILABLE', batchNumber) : { open: true, proof }
    }
    case BundleKind.EXECUTE: {
      // skip mode never waits for prove confirmation, only for the prove bundle to exist
      const ready = mode.kind === 'skip' ? progress.commitConfirmed && progress.proveFormed : progress.proveConfirmed
      return ready ? { open: true, proof: '0x' } : closed('PROOF_UNAVAILABLE', batchNumber)
    }
  }
}

/** Proofs reported to the node as they are produced. */
export class InMemoryProofSource implements ProofSource {
  private readonly proofs: Map<number, string> = new Map()

  report(batchNumber: number, proof: string): void {
    this.proofs.set(batchNumber, proof)
  }

  async isProofReady(batchNumber: number): Promise<boolean> {
    return this.proofs.has(batchNumber)
  }

  async loadProof(batchNumber: number): Promise<string | null> {
    return this.proofs.get(batchNumber) ?? null
  }
}
