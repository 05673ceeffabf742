import { ZodError } from 'zod'
import { parseLine } from '../../src/ingest'
import { txHash } from '../helpers/fixtures'

describe('parseLine', () => {
  test('tx measurements become bigint quantities', () => {
    const line = JSON.stringify({ type: 'tx', txHash: txHash(1), gas: 21000, dataSize: '120', geometry: 3, pubdata: '64', gasPrice: '250000000' })
    expect(parseLine(line)).toEqual({
      type: 'tx',
      cost: { txHash: txHash(1), gas: 21000n, dataSize: 120n, geometry: 3n, pubdata: 64n, gasPrice: 250_000_000n },
    })
  })

  test('state roots and proofs', () => {
    const root = '0x' + 'ab'.repeat(32)
    expect(parseLine(JSON.stringify({ type: 'stateRoot', root }))).toEqual({ type: 'stateRoot', root })
    expect(parseLine('{"type":"proof","batchNumber":7,"proof":"0xbeef"}')).toEqual({ type: 'proof', batchNumber: 7, proof: '0xbeef' })
  })

  test('rejects malformed lines', () => {
    expect(() => parseLine('not json')).toThrow(SyntaxError)
    expect(() => parseLine(JSON.stringify({ type: 'tx', txHash: '0x12', gas: 1, dataSize: 1, geometry: 1, pubdata: 1 }))).toThrow(ZodError)
    expect(() => parseLine(JSON.stringify({ type: 'tx', txHash: txHash(2), gas: -1, dataSize: 1, geometry: 1, pubdata: 1 }))).toThrow(ZodError)
    expect(() => parseLine('{"type":"proof","batchNumber":1,"proof":"0xabc"}')).toThrow(ZodError)
    expect(() => parseLine('{"type":"block"}')).toThrow(ZodError)
  })
})
