// ─── Deferred / withResolvers ────────────────────────────────────────────────

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T | PromiseLike<T>) => void
  reject: (reason?: unknown) => void
}

export const withResolvers = <T>(): Deferred<T> => {
  let resolve!: (value: T | PromiseLike<T>) => void
  let reject!: (reason?: unknown) => void
  const promise = new Promise<T>((resolve_fn, reject_fn) => {
    resolve = resolve_fn
    reject = reject_fn
  })
  return { promise, resolve, reject }
}

// ─── Completion ──────────────────────────────────────────────────────────────

export type CompletionOutcome<T> = { status: 'fulfilled'; value: T } | { status: 'rejected'; error: unknown }

// A Deferred that remembers how it settled. Only the first resolve/reject call has any
// effect, and the outcome can be read synchronously (promises cannot be inspected).
export class Completion<T> {
  readonly promise: Promise<T>

  private readonly deferred: Deferred<T>
  private settled_outcome: CompletionOutcome<T> | null

  constructor() {
    this.deferred = withResolvers<T>()
    this.promise = this.deferred.promise
    this.settled_outcome = null
  }

  // null while pending
  get outcome(): CompletionOutcome<T> | null {
    return this.settled_outcome
  }

  get is_settled(): boolean {
    return this.settled_outcome !== null
  }

  resolve(value: T): boolean {
    if (this.settled_outcome) {
      return false
    }
    this.settled_outcome = { status: 'fulfilled', value }
    this.deferred.resolve(value)
    return true
  }

  reject(error: unknown): boolean {
    if (this.settled_outcome) {
      return false
    }
    this.settled_outcome = { status: 'rejected', error }
    this.deferred.reject(error)
    return true
  }
}
