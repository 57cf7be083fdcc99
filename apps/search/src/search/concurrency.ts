/**
 * Concurrency primitives for provider fan-out.
 */

/**
 * Counting semaphore. Waiters are served in arrival order and a released
 * permit passes straight to the next waiter.
 */
export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`)
    }
    this.available = capacity
  }

  /**
   * Wait for a permit. The returned function releases it; extra calls are ignored.
   */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }
    return this.releaser()
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }

  get inUse(): number {
    return this.capacity - this.available
  }

  get waiting(): number {
    return this.waiters.length
  }

  private releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        next()
      } else {
        this.available++
      }
    }
  }
}

/**
 * Run a task with its own abort signal and a deadline. When the deadline
 * passes the signal aborts with the timeout error and the returned promise
 * rejects with it, whatever the task does afterwards.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  timeoutError: () => Error
): Promise<T> {
  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = timeoutError()
      controller.abort(error)
      reject(error)
    }, timeoutMs)

    let pending: Promise<T>
    try {
      pending = task(controller.signal)
    } catch (error) {
      clearTimeout(timer)
      reject(error)
      return
    }

    pending.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      }
    )
  })
}
