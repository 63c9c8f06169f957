import { Completion } from './completion.js'
import { throwIfAborted } from './errors.js'
import { INFINITE_TIMEOUT, RESOLVED_FALSE, RESOLVED_TRUE, parseTimeout, waitOrFalse } from './timing.js'

/**
 * A single-release gate. Each `set()` releases exactly one waiter, oldest first, or is
 * remembered until the next `wait()` if nobody is waiting. Waiting consumes the signal, so
 * there is no `reset()`.
 *
 * Invariant: `signaled` is only ever true while `waiters` is empty.
 */
export class AsyncAutoResetEvent {
  private signaled: boolean
  private readonly waiters: Array<Completion<boolean>> // FIFO; a waiter is only ever removed by set()

  constructor() {
    this.signaled = false
    this.waiters = []
  }

  get is_set(): boolean {
    return this.signaled
  }

  // Includes waiters that timed out or were cancelled but have not yet had their release forwarded.
  get waiter_count(): number {
    return this.waiters.length
  }

  wait(signal?: AbortSignal | null): Promise<void>
  wait(timeout_ms: number, signal?: AbortSignal | null): Promise<boolean>
  wait(timeout_or_signal?: number | AbortSignal | null, signal?: AbortSignal | null): Promise<boolean | void> {
    if (typeof timeout_or_signal === 'number') {
      return this.waitCore(parseTimeout(timeout_or_signal, 'AsyncAutoResetEvent.wait'), signal ?? null)
    }
    return this.waitCore(INFINITE_TIMEOUT, timeout_or_signal ?? null).then(() => undefined)
  }

  set(run_inline: boolean = true): void {
    const waiter = this.waiters.shift()
    if (!waiter) {
      this.signaled = true
      return
    }
    if (run_inline) {
      waiter.resolve(true)
      return
    }
    setTimeout(() => {
      waiter.resolve(true)
    }, 0)
  }

  private waitCore(timeout: number, signal: AbortSignal | null): Promise<boolean> {
    throwIfAborted(signal, 'AsyncAutoResetEvent.wait()')

    if (this.signaled) {
      this.signaled = false
      return RESOLVED_TRUE
    }
    if (timeout === 0) {
      return RESOLVED_FALSE
    }
    const waiter = new Completion<boolean>()
    this.waiters.push(waiter)

    if (timeout === INFINITE_TIMEOUT && !signal) {
      return waiter.promise
    }

    return waitOrFalse(waiter, timeout, signal).then(
      (released) => {
        if (!released) {
          this.forwardAbandonedRelease(waiter)
        }
        return released
      },
      (error: unknown) => {
        this.forwardAbandonedRelease(waiter)
        throw error
      }
    )
  }

  // A waiter that gave up stays in the queue (it cannot be removed from the middle), so
  // when set() eventually reaches it the release is passed on to whoever is next.
  private forwardAbandonedRelease(waiter: Completion<boolean>): void {
    void waiter.promise.then(() => {
      this.set()
    })
  }
}
