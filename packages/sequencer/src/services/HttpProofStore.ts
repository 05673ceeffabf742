import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import { ProofUnavailable, reason } from '@sealkeeper/reasons'
import type { ProofStore } from './ProofGate'

const ProofResponseSchema = z.object({
  batchNumber: z.number().int().nonnegative(),
  proof: z.string().regex(/^0x([0-9a-fA-F]{2})*$/, 'proof must be 0x-prefixed hex bytes'),
})

/**
 * HttpProofStore
 *
 * Loads proofs produced by the external prover from an object store fronted by HTTP:
 *  - GET {baseUrl}/proofs/{batchNumber} -> { batchNumber, proof }
 *  - 404 means the proof is not there yet
 */
export class HttpProofStore implements ProofStore {
  private http: AxiosInstance

  constructor(baseUrl: string, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: baseUrl.replace(/\/$/, ''),
      timeout: 10_000
    })
  }

  async loadProof(batchNumber: number): Promise<string | null> {
    const res = await this.http.get(`/proofs/${batchNumber}`, {
      validateStatus: s => (s >= 200 && s < 300) || s === 404
    })
    if (res.status === 404) return null
    const body = ProofResponseSchema.parse(res.data)
    if (body.batchNumber !== batchNumber) {
      throw new ProofUnavailable(
        reason('PROOF_UNAVAILABLE', {
          message: `proof store returned batch ${body.batchNumber} for ${batchNumber}`,
          context: { returned: body.batchNumber }
        }),
        batchNumber
      )
    }
    return body.proof
  }
}
