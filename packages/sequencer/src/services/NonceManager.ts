import type { L1Client } from '../clients/L1Client'
import { getLogger } from '../utils/logger'
import { Mutex } from '../utils/mutex'

const log = getLogger('nonce-manager')

/**
 * NonceManager
 * - Tracks the operator's next nonce in memory, seeded from the pending transaction count
 * - Reservations are serialized through a FIFO mutex
 * - Leases remember which bundle holds which nonce until it is included;
 *   a bundle asking again gets the nonce it already holds
 */
export class NonceManager {
  private nextNonce?: number
  private readonly mutex = new Mutex()
  private readonly leases: Map<number, { bundleId: string; txHash?: string }> = new Map()

  constructor(private readonly client: L1Client) {}

  async reserveNonce(bundleId: string): Promise<number> {
    return this.mutex.run(async () => {
      if (this.nextNonce === undefined) {
        this.nextNonce = await this.client.getPendingNonce()
        log.info({ event: 'nonce.seeded', address: this.client.address, nonce: this.nextNonce })
      }
      const held = this.leaseOf(bundleId)
      if (held !== undefined) return held
      const current = this.nextNonce
      this.leases.set(current, { bundleId })
      this.nextNonce = current + 1
      log.debug({ event: 'nonce.reserved', nonce: current, next: this.nextNonce, bundleId })
      return current
    })
  }

  /** Mark that a reserved nonce has been broadcast with a tx hash */
  markBroadcast(nonce: number, txHash: string): void {
    const lease = this.leases.get(nonce)
    if (lease) lease.txHash = txHash
  }

  /** Mark that the reserved nonce was included or abandoned; release the lease */
  release(nonce: number): void {
    this.leases.delete(nonce)
  }

  /** Force refresh from chain pending count */
  async refreshFromChain(): Promise<number> {
    return this.mutex.run(async () => {
      const seed = await this.client.getPendingNonce()
      this.nextNonce = seed
      log.info({ event: 'nonce.refreshed', address: this.client.address, nonce: seed })
      return seed
    })
  }

  private leaseOf(bundleId: string): number | undefined {
    for (const [nonce, lease] of this.leases) {
      if (lease.bundleId === bundleId) return nonce
    }
    return undefined
  }

  get next(): number | undefined {
    return this.nextNonce
  }
}
