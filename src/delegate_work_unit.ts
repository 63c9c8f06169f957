import { v7 as uuidv7 } from 'uuid'

import { Completion } from './completion.js'
import { InvalidTimeoutError, OperationCancelledError, OperationTimeoutError, throwIfAborted } from './errors.js'
import { INFINITE_TIMEOUT, parseTimeout } from './timing.js'

export type DelegateAction<R> = () => R | PromiseLike<R>

// What AsyncDelegatePump queues: something that knows how to run itself.
export interface DelegateWorkItem {
  execute(): void | PromiseLike<void>
}

// Fire-and-forget item queued by AsyncDelegatePump.post(); failures go to the pump's error hook.
export class PostedWorkUnit implements DelegateWorkItem {
  private readonly action: DelegateAction<unknown>

  constructor(action: DelegateAction<unknown>) {
    this.action = action
  }

  async execute(): Promise<void> {
    await this.action()
  }
}

// 'pending' -> 'started' when the pump reaches it first,
// 'pending' -> 'cancelled' | 'timed_out' when the signal or the deadline wins instead.
export type WorkUnitState = 'pending' | 'started' | 'cancelled' | 'timed_out'

export type DelegateWorkUnitOptions = {
  timeout_ms?: number // deadline for the pump to *start* the action; -1/Infinity for none, 0 is rejected
  signal?: AbortSignal | null // cancels the unit only while it is still pending
}

/**
 * A queued action together with the deadline and cancellation signal that apply until the
 * pump gets to it. Whoever moves the unit out of 'pending' first (the timer, the signal, or
 * the pump) owns it; the other two become no-ops. Once started the action always runs to
 * completion and its outcome is forwarded to `promise`.
 */
export class DelegateWorkUnit<R> implements DelegateWorkItem {
  readonly id: string
  readonly timeout_ms: number
  state: WorkUnitState

  private readonly action: DelegateAction<R>
  private readonly result: Completion<R>
  private readonly signal: AbortSignal | null
  private timer: ReturnType<typeof setTimeout> | null

  constructor(action: DelegateAction<R>, options: DelegateWorkUnitOptions = {}) {
    if (typeof action !== 'function') {
      throw new TypeError(`send(action) requires a function, got ${typeof action}`)
    }
    const timeout = parseTimeout(options.timeout_ms ?? INFINITE_TIMEOUT, 'send')
    if (timeout === 0) {
      throw new InvalidTimeoutError('send(timeout_ms=0): a zero timeout can never start the action', { timeout_ms: 0 })
    }
    const signal = options.signal ?? null
    throwIfAborted(signal, 'send()')

    this.id = uuidv7()
    this.timeout_ms = timeout
    this.state = 'pending'
    this.action = action
    this.result = new Completion<R>()
    this.signal = signal
    this.timer = timeout === INFINITE_TIMEOUT ? null : setTimeout(this.onDeadline, timeout)
    signal?.addEventListener('abort', this.onAbort, { once: true })
  }

  get promise(): Promise<R> {
    return this.result.promise
  }

  execute(): void | Promise<void> {
    if (!this.claim('started')) {
      return // already timed out or cancelled; skip it in its turn
    }
    let returned: R | PromiseLike<R>
    try {
      returned = this.action()
    } catch (error) {
      this.result.reject(error)
      return
    }
    return Promise.resolve(returned).then(
      (value) => {
        this.result.resolve(value)
      },
      (error: unknown) => {
        this.result.reject(error)
      }
    )
  }

  private readonly onDeadline = (): void => {
    this.timer = null
    if (!this.claim('timed_out')) {
      return
    }
    this.result.reject(
      new OperationTimeoutError(`Work unit ${this.id} was not started within ${this.timeout_ms}ms`, { timeout_ms: this.timeout_ms })
    )
  }

  private readonly onAbort = (): void => {
    if (!this.claim('cancelled')) {
      return
    }
    this.result.reject(new OperationCancelledError(`Work unit ${this.id} was cancelled before it started`, { reason: this.signal?.reason }))
  }

  private claim(next: Exclude<WorkUnitState, 'pending'>): boolean {
    if (this.state !== 'pending') {
      return false
    }
    this.state = next
    if (this.timer !== null) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.signal?.removeEventListener('abort', this.onAbort)
    return true
  }
}
