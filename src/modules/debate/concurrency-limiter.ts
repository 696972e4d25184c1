/**
 * ConcurrencyLimiter: counting semaphore shared by every stage of a session.
 *
 * Tasks beyond the limit wait in a FIFO queue and start as slots free up.
 */

export class ConcurrencyLimiter {
  private readonly _limit: number
  private _running = 0
  private _peak = 0
  private readonly _queue: (() => void)[] = []

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${String(limit)}`)
    }
    this._limit = limit
  }

  get limit(): number {
    return this._limit
  }

  /** Tasks currently holding a slot */
  get running(): number {
    return this._running
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this._queue.length
  }

  /** Highest number of slots held at once since construction */
  get peak(): number {
    return this._peak
  }

  /**
   * Run `task` once a slot is free; the slot is released however it settles.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this._acquire()
    try {
      return await task()
    } finally {
      this._release()
    }
  }

  private _acquire(): Promise<void> {
    if (this._running < this._limit) {
      this._take()
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this._queue.push(() => {
        this._take()
        resolve()
      })
    })
  }

  private _take(): void {
    this._running++
    if (this._running > this._peak) this._peak = this._running
  }

  private _release(): void {
    this._running--
    const next = this._queue.shift()
    if (next !== undefined) next()
  }
}
