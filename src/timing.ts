import { z } from 'zod'

import { Completion } from './completion.js'
import { InvalidTimeoutError, OperationCancelledError } from './errors.js'

export const INFINITE_TIMEOUT = -1
export const MAX_TIMEOUT_MS = 2_147_483_647 // largest delay setTimeout honours without clamping to 1ms

// Shared already-settled results, handed out instead of allocating per call.
export const RESOLVED_TRUE: Promise<boolean> = Promise.resolve(true)
export const RESOLVED_FALSE: Promise<boolean> = Promise.resolve(false)
export const RESOLVED_VOID: Promise<void> = Promise.resolve()

// -1 and Infinity both mean "wait forever"; normalized to -1.
export const TimeoutSchema = z
  .number()
  .refine((value) => value === INFINITE_TIMEOUT || value === Infinity || (value >= 0 && value <= MAX_TIMEOUT_MS), {
    message: `timeout must be -1, Infinity, or between 0 and ${MAX_TIMEOUT_MS} milliseconds`,
  })
  .transform((value) => (value === Infinity ? INFINITE_TIMEOUT : value))

export const parseTimeout = (timeout_ms: unknown, operation: string = 'wait'): number => {
  const parsed = TimeoutSchema.safeParse(timeout_ms)
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'invalid timeout'
    throw new InvalidTimeoutError(`${operation}(timeout_ms=${String(timeout_ms)}): ${message}`, { timeout_ms })
  }
  return parsed.data
}

// Race `completion` against an optional deadline and an optional AbortSignal.
// Resolves with its result if it settles first, false if the deadline elapses first,
// and rejects with OperationCancelledError if the signal fires first. The losing timer and
// abort listener are released before the returned promise settles. Takes a Completion rather
// than a promise because an outcome that already exists must win over a zero timeout.
export function waitOrFalse(
  completion: Completion<boolean>,
  timeout_ms: number = INFINITE_TIMEOUT,
  signal?: AbortSignal | null
): Promise<boolean> {
  const timeout = parseTimeout(timeout_ms, 'waitOrFalse')
  const promise = completion.promise

  if (completion.is_settled || (timeout === INFINITE_TIMEOUT && !signal)) {
    return promise
  }
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError('wait was cancelled before it started', { reason: signal.reason }))
  }
  if (timeout === 0) {
    return RESOLVED_FALSE
  }

  return new Promise<boolean>((resolve, reject) => {
    let settled = false
    let timer: ReturnType<typeof setTimeout> | null = null

    const release = () => {
      settled = true
      if (timer !== null) {
        clearTimeout(timer)
        timer = null
      }
      signal?.removeEventListener('abort', onAbort)
    }
    const finishResolve = (value: boolean) => {
      if (settled) {
        return
      }
      release()
      resolve(value)
    }
    const finishReject = (error: unknown) => {
      if (settled) {
        return
      }
      release()
      reject(error)
    }
    // The completion may have settled earlier in this same turn, before our .then() ran.
    const settleFromCompletion = (): boolean => {
      const outcome = completion.outcome
      if (!outcome) {
        return false
      }
      if (outcome.status === 'fulfilled') {
        finishResolve(outcome.value)
      } else {
        finishReject(outcome.error)
      }
      return true
    }
    const onAbort = () => {
      if (settleFromCompletion()) {
        return
      }
      finishReject(new OperationCancelledError('wait was cancelled', { reason: signal?.reason }))
    }

    if (timeout !== INFINITE_TIMEOUT) {
      timer = setTimeout(() => {
        timer = null
        if (settleFromCompletion()) {
          return
        }
        finishResolve(false)
      }, timeout)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    void promise.then(finishResolve, finishReject)
  })
}
