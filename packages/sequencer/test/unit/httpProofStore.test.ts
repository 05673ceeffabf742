import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import { ProofUnavailable } from '@sealkeeper/reasons'
import { HttpProofStore } from '../../src/services/HttpProofStore'

type Reply = { status: number; data: unknown }

function storeReplying(reply: Reply) {
  const requested: string[] = []
  const http = axios.create({
    baseURL: 'http://proofs.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requested.push(`${config.baseURL}${config.url}`)
      return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config }
    },
  })
  return { store: new HttpProofStore('http://proofs.test', http), requested }
}

describe('HttpProofStore', () => {
  test('returns the proof bytes for the requested batch', async () => {
    const { store, requested } = storeReplying({ status: 200, data: { batchNumber: 7, proof: '0xabcd' } })
    expect(await store.loadProof(7)).toBe('0xabcd')
    expect(requested).toEqual(['http://proofs.test/proofs/7'])
  })

  test('404 means not there yet', async () => {
    const { store } = storeReplying({ status: 404, data: 'not found' })
    expect(await store.loadProof(3)).toBeNull()
  })

  test('a proof for another batch is an error', async () => {
    const { store } = storeReplying({ status: 200, data: { batchNumber: 8, proof: '0xabcd' } })
    const loading = store.loadProof(7)
    await expect(loading).rejects.toBeInstanceOf(ProofUnavailable)
    await expect(loading).rejects.toMatchObject({ code: 'PROOF_UNAVAILABLE', batchNumber: 7, message: 'proof store returned batch 8 for 7' })
  })

  test('malformed bodies are rejected', async () => {
    const { store } = storeReplying({ status: 200, data: { batchNumber: 7, proof: 'xyz' } })
    await expect(store.loadProof(7)).rejects.toThrow('proof must be 0x-prefixed hex bytes')
  })
})
