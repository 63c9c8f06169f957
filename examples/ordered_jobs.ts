#!/usr/bin/env -S node --import tsx
// Run: node --import tsx examples/ordered_jobs.ts

import { AsyncAutoResetEvent, AsyncDelegatePump, AsyncManualResetEvent, OperationTimeoutError } from '../src/index.js'

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

async function main(): Promise<void> {
  // 1) A delegate pump serializes writes coming from many callers.
  const pump = new AsyncDelegatePump({ name: 'FileWriterPump', slow_timeout_ms: 500 })
  const lines: string[] = []

  const writes = ['alpha', 'beta', 'gamma'].map((word, index) =>
    pump.send(async () => {
      await delay(30 - index * 10) // later writes are faster, but still land in order
      lines.push(word)
      return lines.length
    })
  )
  console.log('line numbers:', await Promise.all(writes))

  // 2) A send that cannot start within its deadline is skipped, never run late.
  const ready = new AsyncManualResetEvent()
  pump.post(() => ready.wait())
  try {
    await pump.send(() => lines.push('too late'), { timeout_ms: 20 })
  } catch (error) {
    if (!(error instanceof OperationTimeoutError)) {
      throw error
    }
    console.log(`skipped: ${error.message}`)
  }
  ready.set()
  await pump.drain()
  console.log('lines:', lines)

  // 3) An auto-reset event hands out one permit per set(), first come first served.
  const permits = new AsyncAutoResetEvent()
  const workers = [1, 2, 3].map(async (id) => {
    await permits.wait()
    console.log(`worker ${id} got a permit`)
  })
  for (let i = 0; i < 3; i += 1) {
    permits.set()
    await delay(5)
  }
  await Promise.all(workers)
}

await main()
