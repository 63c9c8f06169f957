import { DelegateWorkUnit, PostedWorkUnit, type DelegateAction, type DelegateWorkItem, type DelegateWorkUnitOptions } from './delegate_work_unit.js'
import { formatError, logger } from './logging.js'
import { AsyncMessagePump, type AsyncMessagePumpOptions, type MessagePumpErrorHandler } from './message_pump.js'

// Delegates always run in the async context of the caller that queued them.
export type AsyncDelegatePumpOptions = Omit<AsyncMessagePumpOptions, 'suppress_async_flow'>

export type SendOptions = DelegateWorkUnitOptions

/**
 * Runs queued actions one at a time, in the order they were posted or sent.
 *
 * `post()` is fire-and-forget. `send()` returns the action's own result and may carry a
 * timeout and an AbortSignal; both only apply until the pump starts the action, after which
 * the action always runs to completion. A unit that timed out or was cancelled while waiting
 * is skipped when its turn comes, so ordering is never disturbed.
 */
export class AsyncDelegatePump {
  private readonly pump: AsyncMessagePump<DelegateWorkItem>
  private readonly on_error: MessagePumpErrorHandler | null

  constructor(options: AsyncDelegatePumpOptions = {}) {
    if (options.on_error !== undefined && options.on_error !== null && typeof options.on_error !== 'function') {
      throw new TypeError(`AsyncDelegatePump options.on_error must be a function, got ${typeof options.on_error}`)
    }
    this.on_error = options.on_error ?? null
    this.pump = new AsyncMessagePump<DelegateWorkItem>((item) => item.execute(), {
      name: options.name ?? this.constructor.name,
      slow_timeout_ms: options.slow_timeout_ms,
      suppress_async_flow: false,
      on_error: (error) => this.handleError(error),
    })
  }

  get id(): string {
    return this.pump.id
  }

  get name(): string {
    return this.pump.name
  }

  toString(): string {
    return this.pump.toString()
  }

  // Includes the unit currently executing and units that timed out but have not been skipped yet.
  get count(): number {
    return this.pump.count
  }

  post(action: DelegateAction<unknown>): void {
    if (typeof action !== 'function') {
      throw new TypeError(`post(action) requires a function, got ${typeof action}`)
    }
    this.pump.post(new PostedWorkUnit(action))
  }

  // Throws InvalidTimeoutError / OperationCancelledError synchronously, before anything is
  // queued, for a bad timeout or an already-aborted signal.
  send<R>(action: DelegateAction<R>, options: SendOptions = {}): Promise<R> {
    const unit = new DelegateWorkUnit(action, options)
    this.pump.post(unit)
    return unit.promise
  }

  drain(): Promise<void> {
    return this.pump.drain()
  }

  // Receives failures of post()ed actions; send() failures go to the sender instead.
  protected async handleError(error: unknown): Promise<void> {
    if (this.on_error) {
      await this.on_error(error)
      return
    }
    logger.error(`Unhandled error in ${this.toString()} action: ${formatError(error)}`, error)
  }
}
