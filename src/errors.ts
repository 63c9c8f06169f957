// Thrown synchronously when a timeout argument is not -1/Infinity or a delay a timer can honour
export class InvalidTimeoutError extends RangeError {
  timeout_ms: unknown

  constructor(message: string, params: { timeout_ms: unknown }) {
    super(message)
    this.name = 'InvalidTimeoutError'
    this.timeout_ms = params.timeout_ms
  }
}

// When an AbortSignal fired before the operation completed (or before it was queued)
export class OperationCancelledError extends Error {
  reason: unknown // the signal's abort reason

  constructor(message: string, params: { reason: unknown }) {
    super(message)
    this.name = 'OperationCancelledError'
    this.reason = params.reason
  }
}

// When a sent work unit's deadline elapsed before the pump started it
export class OperationTimeoutError extends Error {
  timeout_ms: number

  constructor(message: string, params: { timeout_ms: number }) {
    super(message)
    this.name = 'OperationTimeoutError'
    this.timeout_ms = params.timeout_ms
  }
}

export const throwIfAborted = (signal: AbortSignal | null | undefined, operation: string): void => {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${operation} was cancelled before it started`, { reason: signal.reason })
  }
}
