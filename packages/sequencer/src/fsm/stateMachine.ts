import { BatchState, BundleState, MiniblockState } from '@sealkeeper/dto'

export class StateMachine<S extends string> {
  constructor(private readonly allowed: Readonly<Record<S, readonly S[]>>) {}

  can(from: S, to: S): boolean {
    return this.allowed[from].includes(to)
  }

  /** Throws when the transition is not in the allowed map. */
  assert(from: S, to: S, subject: string): void {
    if (!this.can(from, to)) throw new Error(`${subject}: illegal transition ${from} -> ${to}`)
  }
}

export const bundleMachine = new StateMachine<BundleState>({
  [BundleState.PENDING]: [BundleState.SUBMITTED, BundleState.FAILED],
  // SUBMITTED -> SUBMITTED is a fee-bumped replacement
  [BundleState.SUBMITTED]: [BundleState.SUBMITTED, BundleState.CONFIRMED, BundleState.FAILED],
  [BundleState.CONFIRMED]: [],
  [BundleState.FAILED]: [],
})

export const batchMachine = new StateMachine<BatchState>({
  [BatchState.OPEN]: [BatchState.SEALING],
  // SEALING -> SEALING retries a failed persist
  [BatchState.SEALING]: [BatchState.SEALED, BatchState.SEALING],
  [BatchState.SEALED]: [],
})

export const miniblockMachine = new StateMachine<MiniblockState>({
  [MiniblockState.OPEN]: [MiniblockState.SEALED],
  [MiniblockState.SEALED]: [],
})
