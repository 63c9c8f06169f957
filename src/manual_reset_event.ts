import { Completion } from './completion.js'
import { throwIfAborted } from './errors.js'
import { INFINITE_TIMEOUT, RESOLVED_FALSE, RESOLVED_TRUE, parseTimeout, waitOrFalse } from './timing.js'

/**
 * A broadcast latch. Once set, every current and future waiter observes the signal until
 * `reset()` is called.
 *
 * Each set/reset cycle is a generation: a Completion that resolves (with `true`) when the
 * event is set. Waiters hold on to the generation current at the time they called `wait()`.
 */
export class AsyncManualResetEvent {
  private generation: Completion<boolean>

  constructor(signaled: boolean = false) {
    this.generation = new Completion<boolean>()
    if (signaled) {
      this.generation.resolve(true)
    }
  }

  get is_set(): boolean {
    return this.generation.is_settled
  }

  /**
   * Resolves once the event is set.
   * Throws OperationCancelledError synchronously if `signal` is already aborted, and the
   * returned promise rejects with it if `signal` fires first.
   */
  wait(signal?: AbortSignal | null): Promise<void>
  /**
   * Resolves true once the event is set, or false if `timeout_ms` elapses first.
   * A zero timeout polls the current state; -1 or Infinity waits forever.
   */
  wait(timeout_ms: number, signal?: AbortSignal | null): Promise<boolean>
  wait(timeout_or_signal?: number | AbortSignal | null, signal?: AbortSignal | null): Promise<boolean | void> {
    if (typeof timeout_or_signal === 'number') {
      return this.waitWithTimeout(timeout_or_signal, signal ?? null)
    }
    const cancel_signal = timeout_or_signal ?? null
    throwIfAborted(cancel_signal, 'AsyncManualResetEvent.wait()')
    const generation = this.generation
    if (!cancel_signal) {
      return generation.promise.then(() => undefined)
    }
    return waitOrFalse(generation, INFINITE_TIMEOUT, cancel_signal).then(() => undefined)
  }

  // run_inline=false defers resolving the captured generation (and every waiter's
  // continuation) to a later macrotask instead of the caller's turn.
  set(run_inline: boolean = true): void {
    const generation = this.generation
    if (generation.is_settled) {
      return
    }
    if (run_inline) {
      generation.resolve(true)
      return
    }
    setTimeout(() => {
      generation.resolve(true)
    }, 0)
  }

  reset(): void {
    // Only swap a resolved generation: resetting an unset event must not orphan its waiters.
    if (this.generation.is_settled) {
      this.generation = new Completion<boolean>()
    }
  }

  private waitWithTimeout(timeout_ms: number, signal: AbortSignal | null): Promise<boolean> {
    const timeout = parseTimeout(timeout_ms, 'AsyncManualResetEvent.wait')
    throwIfAborted(signal, 'AsyncManualResetEvent.wait()')
    const generation = this.generation
    if (timeout === 0) {
      return generation.is_settled ? RESOLVED_TRUE : RESOLVED_FALSE
    }
    return waitOrFalse(generation, timeout, signal)
  }
}
