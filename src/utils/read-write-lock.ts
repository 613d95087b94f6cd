interface Waiter {
  exclusive: boolean
  resolve: () => void
}

/**
 * Async readers-writer lock.
 * Any number of readers may hold it together; a writer holds it alone.
 * Once a writer is waiting, readers that arrive later queue behind it.
 */
export class ReadWriteLock {
  private activeReaders = 0
  private queue: Waiter[] = []
  private writerActive = false

  async withRead<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire(false)
    try {
      return await task()
    }
    finally {
      this.release(false)
    }
  }

  async withWrite<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire(true)
    try {
      return await task()
    }
    finally {
      this.release(true)
    }
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.grant(exclusive)

      return Promise.resolve()
    }

    return new Promise((resolve) => {
      this.queue.push({ exclusive, resolve })
    })
  }

  private canGrant(exclusive: boolean): boolean {
    if (exclusive) {
      return !this.writerActive && this.activeReaders === 0
    }

    return !this.writerActive
  }

  private grant(exclusive: boolean): void {
    if (exclusive) {
      this.writerActive = true
    }
    else {
      this.activeReaders++
    }
  }

  private release(exclusive: boolean): void {
    if (exclusive) {
      this.writerActive = false
    }
    else {
      this.activeReaders--
    }

    this.drain()
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const [next] = this.queue
      if (!this.canGrant(next.exclusive)) {
        return
      }

      this.queue.shift()
      this.grant(next.exclusive)
      next.resolve()

      if (next.exclusive) {
        return
      }
    }
  }
}
