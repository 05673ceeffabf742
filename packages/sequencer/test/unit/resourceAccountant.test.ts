import { BatchState, ResourceDimension } from '@sealkeeper/dto'
import { ResourceAccountant } from '../../src/services/ResourceAccountant'
import { cost, txHash } from '../helpers/fixtures'

describe('ResourceAccountant', () => {
  it('admit adds to both the open miniblock and the open batch', () => {
    const acc = new ResourceAccountant(1000)
    const state = acc.admit({ txHash: txHash(1), gas: 100n, dataSize: 10n, geometry: 1n, pubdata: 5n })
    expect(state.batch.usage).toEqual({ GAS: 100n, DATA_SIZE: 10n, GEOMETRY: 1n, PUBDATA: 5n })
    expect(state.miniblock.usage[ResourceDimension.GAS]).toBe(100n)
    expect(state.miniblock.txHashes).toEqual([txHash(1)])
    expect(state.batch.txCount).toBe(1)
  })

  it('wouldExceed and projected are side-effect free', () => {
    const acc = new ResourceAccountant(0)
    acc.admit(cost({ gas: 100n }))
    expect(acc.wouldExceed(cost({ gas: 901n }), ResourceDimension.GAS, 1000n)).toBe(true)
    expect(acc.wouldExceed(cost({ gas: 900n }), ResourceDimension.GAS, 1000n)).toBe(false)
    expect(acc.projected(cost({ gas: 50n }))[ResourceDimension.GAS]).toBe(150n)
    expect(acc.state().batch.usage[ResourceDimension.GAS]).toBe(100n)
  })

  it('dimensions never borrow from each other', () => {
    const acc = new ResourceAccountant(0)
    acc.admit(cost({ pubdata: 700n }))
    expect(acc.state().batch.usage[ResourceDimension.GAS]).toBe(0n)
    expect(acc.wouldExceed(cost({ gas: 1n }), ResourceDimension.GAS, 0n)).toBe(true)
    expect(acc.wouldExceed(cost({ pubdata: 300n }), ResourceDimension.PUBDATA, 1000n)).toBe(false)
  })

  it('sealMiniblock moves the open miniblock into the batch and opens the next one', () => {
    const acc = new ResourceAccountant(0)
    acc.admit({ txHash: txHash(7), gas: 1n, dataSize: 0n, geometry: 0n, pubdata: 0n })
    const sealed = acc.sealMiniblock(2000)
    expect(sealed).toBeDefined()
    expect(sealed?.number).toBe(1)
    expect(sealed?.txHashes).toEqual([txHash(7)])
    expect(sealed?.sealedAt).toBe(2000)
    const state = acc.state()
    expect(state.miniblock.number).toBe(2)
    expect(state.miniblock.txHashes).toEqual([])
    expect(state.miniblock.openedAt).toBe(2000)
    expect(state.batch.miniblocks).toHaveLength(1)
    expect(Object.isFrozen(sealed)).toBe(true)
  })

  it('never seals an empty miniblock', () => {
    const acc = new ResourceAccountant(0)
    expect(acc.sealMiniblock(10)).toBeUndefined()
    expect(acc.state().miniblock.number).toBe(1)
  })

  it('reset closes a sealing batch and opens an empty one', () => {
    const acc = new ResourceAccountant(0)
    acc.admit(cost({ gas: 5n }))
    acc.sealMiniblock(10)
    acc.markSealing()
    const closed = acc.reset(3000)
    expect(closed.state).toBe(BatchState.SEALED)
    expect(closed.txCount).toBe(1)
    const state = acc.state()
    expect(state.batch.state).toBe(BatchState.OPEN)
    expect(state.batch.txCount).toBe(0)
    expect(state.batch.openedAt).toBe(3000)
    expect(state.batch.usage[ResourceDimension.GAS]).toBe(0n)
  })

  it('markSealing can repeat while a persist is retried', () => {
    const acc = new ResourceAccountant(0)
    acc.markSealing()
    expect(() => acc.markSealing()).not.toThrow()
  })
})
