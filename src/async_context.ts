import { AsyncLocalStorage } from 'node:async_hooks'

// A frozen copy of every AsyncLocalStorage store active at capture time.
export type AsyncContextSnapshot = ReturnType<typeof AsyncLocalStorage.snapshot>

// Called at the post site: pumps may run the work later from a different async context
// (whichever caller happened to start the loop), so the poster's context is captured here
// and restored around that item's callback.
export const captureAsyncContext = (): AsyncContextSnapshot => AsyncLocalStorage.snapshot()

export const runWithAsyncContext = <T>(context: AsyncContextSnapshot | null, fn: () => T): T => {
  if (!context) {
    return fn()
  }
  return context(fn)
}
