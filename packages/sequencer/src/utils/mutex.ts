/**
 * FIFO async mutex. Waiters acquire in arrival order; `run` releases even when the task throws.
 */
export class Mutex {
  private queue: Array<() => void> = []

  private acquire(): Promise<void> {
    return new Promise<void>(resolve => {
      this.queue.push(resolve)
      // If we're the only waiter, acquire immediately
      if (this.queue.length === 1) resolve()
    })
  }

  private release(): void {
    // Remove current holder
    this.queue.shift()
    const next = this.queue[0]
    if (next) next()
  }

  async run<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }
}
