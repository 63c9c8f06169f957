export { AsyncManualResetEvent } from './manual_reset_event.js'
export { AsyncAutoResetEvent } from './auto_reset_event.js'
export { AsyncMessagePump, MessagePumpOptionsSchema } from './message_pump.js'
export type { AsyncMessagePumpOptions, MessagePumpCallback, MessagePumpErrorHandler } from './message_pump.js'
export { AsyncDelegatePump } from './delegate_pump.js'
export type { AsyncDelegatePumpOptions, SendOptions } from './delegate_pump.js'
export { DelegateWorkUnit, PostedWorkUnit } from './delegate_work_unit.js'
export type { DelegateAction, DelegateWorkItem, DelegateWorkUnitOptions, WorkUnitState } from './delegate_work_unit.js'
export { Completion, withResolvers } from './completion.js'
export type { CompletionOutcome, Deferred } from './completion.js'
export { waitOrFalse, parseTimeout, TimeoutSchema, INFINITE_TIMEOUT, MAX_TIMEOUT_MS } from './timing.js'
export { InvalidTimeoutError, OperationCancelledError, OperationTimeoutError } from './errors.js'
export { captureAsyncContext, runWithAsyncContext } from './async_context.js'
export type { AsyncContextSnapshot } from './async_context.js'
export { logger, setLogger } from './logging.js'
export type { Logger } from './logging.js'
