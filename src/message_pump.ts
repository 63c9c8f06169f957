import { v7 as uuidv7 } from 'uuid'
import { z } from 'zod'

import { captureAsyncContext, runWithAsyncContext, type AsyncContextSnapshot } from './async_context.js'
import { Completion } from './completion.js'
import { formatError, logger } from './logging.js'
import { MAX_TIMEOUT_MS, RESOLVED_VOID } from './timing.js'

export type MessagePumpCallback<T> = (message: T) => void | PromiseLike<void>
export type MessagePumpErrorHandler = (error: unknown) => void | PromiseLike<void>

export type AsyncMessagePumpOptions = {
  name?: string // shows up in log lines, e.g. "OrdersPump#a1b2"
  on_error?: MessagePumpErrorHandler | null // receives failures of posted promises and of the callback
  suppress_async_flow?: boolean // when true, callbacks run in the loop's context instead of the poster's
  slow_timeout_ms?: number | null // warn when a single item is in flight longer than this
}

export const MessagePumpOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  suppress_async_flow: z.boolean().optional(),
  slow_timeout_ms: z.number().positive().max(MAX_TIMEOUT_MS).nullable().optional(),
})

type PumpMessage<T> = { kind: 'value'; value: T } | { kind: 'pending'; promise: Promise<T> }

type PumpEntry<T> = {
  message: PumpMessage<T>
  context: AsyncContextSnapshot | null // poster's async context, restored around the callback
}

const isPromiseLike = <T>(value: T | PromiseLike<T>): value is PromiseLike<T> =>
  typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'

/**
 * An ordered, single-consumer executor. Messages may be posted from any number of callers;
 * the callback sees them one at a time, in post order, and never runs concurrently with itself.
 *
 * The caller whose post finds the queue empty starts the processing loop; every other post
 * just appends. The in-flight message stays at the head of the queue until its callback has
 * finished, so `count` includes it.
 */
export class AsyncMessagePump<T> {
  readonly id: string
  readonly name: string
  readonly suppress_async_flow: boolean
  readonly slow_timeout_ms: number | null

  private readonly callback: MessagePumpCallback<T>
  private readonly on_error: MessagePumpErrorHandler | null
  private readonly queue: Array<PumpEntry<T>> // head is the in-flight entry
  private drain_waiter: Completion<void> | null // created lazily by drain(), resolved when the queue empties

  constructor(callback: MessagePumpCallback<T>, options: AsyncMessagePumpOptions = {}) {
    if (typeof callback !== 'function') {
      throw new TypeError(`AsyncMessagePump(callback) requires a function, got ${typeof callback}`)
    }
    const parsed = MessagePumpOptionsSchema.safeParse(options)
    if (!parsed.success) {
      throw new TypeError(`Invalid AsyncMessagePump options: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`)
    }
    if (options.on_error !== undefined && options.on_error !== null && typeof options.on_error !== 'function') {
      throw new TypeError(`AsyncMessagePump options.on_error must be a function, got ${typeof options.on_error}`)
    }

    this.id = uuidv7()
    this.name = parsed.data.name ?? this.constructor.name
    this.suppress_async_flow = parsed.data.suppress_async_flow ?? false
    this.slow_timeout_ms = parsed.data.slow_timeout_ms === undefined ? null : parsed.data.slow_timeout_ms

    this.callback = callback
    this.on_error = options.on_error ?? null
    this.queue = []
    this.drain_waiter = null
  }

  toString(): string {
    return `${this.name}#${this.id.slice(-4)}`
  }

  // Number of messages waiting, including the one currently being processed.
  get count(): number {
    return this.queue.length
  }

  // Accepts a plain value or a promise for one; a promise holds its place in the queue
  // and is awaited when it reaches the head.
  post(message: T | PromiseLike<T>): void {
    const entry: PumpEntry<T> = {
      message: isPromiseLike(message) ? { kind: 'pending', promise: this.holdRejection(message) } : { kind: 'value', value: message },
      context: this.suppress_async_flow ? null : captureAsyncContext(),
    }
    this.queue.push(entry)
    if (this.queue.length !== 1) {
      return
    }
    // this post made the queue non-empty: any earlier drain handle has already resolved
    this.drain_waiter = null
    void this.runloop()
  }

  drain(): Promise<void> {
    if (this.queue.length === 0) {
      return RESOLVED_VOID
    }
    if (!this.drain_waiter) {
      this.drain_waiter = new Completion<void>()
    }
    return this.drain_waiter.promise
  }

  // Override to observe failures of posted promises and of the callback. Anything this
  // throws is logged and discarded; the loop keeps going either way.
  protected async handleError(error: unknown): Promise<void> {
    if (this.on_error) {
      await this.on_error(error)
      return
    }
    logger.error(`Unhandled error in ${this.toString()} callback: ${formatError(error)}`, error)
  }

  // A queued promise may reject long before it reaches the head; its rejection is delivered
  // to handleError in its turn, so mark it handled now to keep it off unhandledRejection.
  private holdRejection(message: PromiseLike<T>): Promise<T> {
    const promise = Promise.resolve(message)
    void promise.catch(() => undefined)
    return promise
  }

  private async runloop(): Promise<void> {
    let entry: PumpEntry<T> | undefined = this.queue[0]
    while (entry) {
      await this.processEntry(entry)
      this.queue.shift()
      entry = this.queue[0]
    }
    const drain_waiter = this.drain_waiter
    this.drain_waiter = null
    drain_waiter?.resolve()
  }

  private async processEntry(entry: PumpEntry<T>): Promise<void> {
    const slow_timer = this.createSlowItemWarningTimer()
    try {
      await runWithAsyncContext(entry.context, () => this.deliver(entry.message))
    } catch (error) {
      await this.reportError(error)
    } finally {
      if (slow_timer) {
        clearTimeout(slow_timer)
      }
    }
  }

  private async deliver(message: PumpMessage<T>): Promise<void> {
    const value = message.kind === 'value' ? message.value : await message.promise
    await this.callback(value)
  }

  private async reportError(error: unknown): Promise<void> {
    try {
      await this.handleError(error)
    } catch (handler_error) {
      logger.error(`${this.toString()} error handler threw while handling ${formatError(error)}: ${formatError(handler_error)}`, handler_error)
    }
  }

  private createSlowItemWarningTimer(): ReturnType<typeof setTimeout> | null {
    if (this.slow_timeout_ms === null) {
      return null
    }
    const started_at_ms = performance.now()
    return setTimeout(() => {
      const elapsed_seconds = ((performance.now() - started_at_ms) / 1000).toFixed(1)
      logger.warn(`Slow pump item: ${this.toString()} item still running after ${elapsed_seconds}s (${this.queue.length - 1} queued behind it)`)
    }, this.slow_timeout_ms)
  }
}
