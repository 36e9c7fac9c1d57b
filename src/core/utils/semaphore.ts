export type Release = () => void

/**
 * Counting semaphore with FIFO hand-off. Waiters are served in arrival order.
 */
export class Semaphore {
  private available: number
  private waiters: Array<(release: Release) => void> = []

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore permits must be a positive integer, got ${permits}`)
    }
    this.available = permits
  }

  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--
      return Promise.resolve(this.createRelease())
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  getStatus() {
    return {
      permits: this.permits,
      available: this.available,
      waiting: this.waiters.length,
    }
  }

  private createRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true

      const next = this.waiters.shift()
      if (next) {
        next(this.createRelease())
      } else {
        this.available++
      }
    }
  }
}

export class Mutex extends Semaphore {
  constructor() {
    super(1)
  }

  isLocked(): boolean {
    return this.getStatus().available === 0
  }
}
