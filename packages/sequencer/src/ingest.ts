/**
 * Newline-delimited JSON fed by the execution side:
 *   {"type":"tx","txHash":"0x..","gas":"21000","dataSize":"120","geometry":"3","pubdata":"64"}
 *   {"type":"stateRoot","root":"0x<32 bytes>"}
 *   {"type":"proof","batchNumber":7,"proof":"0x.."}
 * Quantities may be JSON numbers or decimal strings.
 */
import { z } from 'zod'
import type { TxCost } from '@sealkeeper/dto'

const quantity = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform(v => BigInt(v))

const TxMessage = z.object({
  type: z.literal('tx'),
  txHash: z.string().regex(/^0x[0-9a-fA-F]{64}$/),
  gas: quantity,
  dataSize: quantity,
  geometry: quantity,
  pubdata: quantity,
  encodedSize: quantity.optional(),
  gasPrice: quantity.optional(),
})

const StateRootMessage = z.object({
  type: z.literal('stateRoot'),
  root: z.string().regex(/^0x[0-9a-fA-F]{64}$/),
})

const ProofMessage = z.object({
  type: z.literal('proof'),
  batchNumber: z.number().int().nonnegative(),
  proof: z.string().regex(/^0x([0-9a-fA-F]{2})*$/),
})

const IngestMessage = z.discriminatedUnion('type', [TxMessage, StateRootMessage, ProofMessage])

export type IngestMessage =
  | { type: 'tx'; cost: TxCost }
  | { type: 'stateRoot'; root: string }
  | { type: 'proof'; batchNumber: number; proof: string }

export function parseLine(line: string): IngestMessage {
  const msg = IngestMessage.parse(JSON.parse(line))
  switch (msg.type) {
    case 'tx': {
      const { type, ...cost } = msg
      return { type, cost }
    }
    case 'stateRoot':
      return msg
    case 'proof':
      return msg
  }
}
