/**
 * Concurrency utilities for serialized access to a single connection
 */

/**
 * FIFO mutual exclusion lock
 * Tasks run one at a time in the order they were queued
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let release: () => void = () => {}
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    this.tail = previous.then(() => current)

    return previous.then(async () => {
      try {
        return await task()
      } finally {
        release()
      }
    })
  }
}
