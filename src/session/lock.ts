/**
 * Runs tasks one at a time per key. Tasks for different keys never wait on
 * each other. A failed task does not block the tasks queued behind it.
 */
export class SessionLock {
  private tails: Map<string, Promise<void>> = new Map()

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  get size(): number {
    return this.tails.size
  }
}
