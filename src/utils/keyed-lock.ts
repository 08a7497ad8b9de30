/**
 * KeyedLock: in-process advisory lock, one FIFO queue per key.
 *
 * Holders of different keys never wait on each other. A key's queue is
 * dropped once its last holder releases.
 */

export class KeyedLock {
  private readonly _tails = new Map<string, Promise<void>>()

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   * The lock is released whether `fn` resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this._tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this._tails.get(key) === tail) {
        this._tails.delete(key)
      }
    }
  }

  /** Whether any holder or waiter exists for `key` */
  isHeld(key: string): boolean {
    return this._tails.has(key)
  }
}
