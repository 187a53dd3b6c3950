/**
 * PlanLock: serializes async work per key.
 *
 * Calls to `run()` with the same key execute one at a time in call order;
 * different keys proceed independently. A rejected task does not stall the
 * queue behind it.
 */

export class PlanLock {
  private readonly _tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    // The tail only orders the queue; the caller observes `result` itself
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this._tails.set(key, tail)
    void tail.then(() => {
      if (this._tails.get(key) === tail) this._tails.delete(key)
    })
    return result
  }

  /** Number of keys with queued or running work */
  size(): number {
    return this._tails.size
  }
}
