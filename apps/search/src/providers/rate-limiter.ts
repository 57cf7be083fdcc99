/**
 * Per-provider request spacing.
 *
 * Each provider instance owns one limiter, so spacing holds across searches
 * running in the same process. Waiting callers are served in arrival order.
 */

export interface RateLimitConfig {
  /** Minimum delay between two request starts, in ms */
  minIntervalMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  minIntervalMs: 2000,
}

/**
 * Reject with the signal's reason once it aborts, resolve after `ms` otherwise.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason)
  }
  if (ms <= 0) {
    return Promise.resolve()
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export class MinIntervalLimiter {
  private nextSlotAt = 0

  constructor(
    private readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Wait until this caller may start a request.
   * The slot is reserved synchronously, so concurrent callers queue up.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const current = this.now()
    const startAt = Math.max(current, this.nextSlotAt)
    this.nextSlotAt = startAt + this.config.minIntervalMs

    await sleep(startAt - current, signal)
  }

  getConfig(): RateLimitConfig {
    return this.config
  }
}
