/**
 * Per-request mutual exclusion. Work queued for one request id runs in
 * arrival order, one at a time; different request ids never wait on each
 * other.
 */
export class RequestLocks {
  private tails = new Map<string, Promise<void>>()

  run<T>(requestId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(requestId) ?? Promise.resolve()
    const result = previous.then(fn)
    const tail = result.then(() => undefined, () => undefined)
    this.tails.set(requestId, tail)
    void tail.then(() => {
      if (this.tails.get(requestId) === tail) this.tails.delete(requestId)
    })
    return result
  }

  isLocked(requestId: string): boolean {
    return this.tails.has(requestId)
  }

  get size(): number {
    return this.tails.size
  }
}
