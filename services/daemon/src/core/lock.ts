/**
 * Promise mutex serializing device state machines.
 *
 * Every caller (notification ingress, open, suspend/resume) runs one
 * operation to completion before the next starts; ownership passes
 * directly to the next waiter on release.
 */
export class Mutex {
  private locked = false
  private readonly waiters: Array<(release: () => void) => void> = []

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true
      return () => this.release()
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      // still locked, transfer ownership
      next(() => this.release())
      return
    }
    this.locked = false
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
