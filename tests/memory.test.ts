import assert from 'node:assert/strict'
import { getEventListeners } from 'node:events'
import { test } from 'node:test'

import { AsyncAutoResetEvent, AsyncDelegatePump, AsyncManualResetEvent, AsyncMessagePump } from '../src/index.js'

const ITERATIONS = 200_000

const activeTimerCount = (): number => process.getActiveResourcesInfo().filter((resource) => resource === 'Timeout').length

test('AsyncAutoResetEvent: wait/set cycles without timeout or signal leave nothing queued', async () => {
  const event = new AsyncAutoResetEvent()
  for (let i = 0; i < ITERATIONS; i += 1) {
    const waiter = event.wait()
    event.set()
    await waiter
  }
  assert.equal(event.waiter_count, 0)
  assert.equal(event.is_set, false)
})

test('AsyncAutoResetEvent: wait/set cycles with a timeout release every timer', async () => {
  const event = new AsyncAutoResetEvent()
  const timers_before = activeTimerCount()
  for (let i = 0; i < ITERATIONS; i += 1) {
    const waiter = event.wait(5000)
    event.set()
    assert.equal(await waiter, true)
  }
  assert.equal(event.waiter_count, 0)
  assert.ok(activeTimerCount() <= timers_before)
})

test('AsyncAutoResetEvent: wait/set cycles with timeout and signal release timers and listeners', async () => {
  const event = new AsyncAutoResetEvent()
  const controller = new AbortController()
  const timers_before = activeTimerCount()
  for (let i = 0; i < ITERATIONS; i += 1) {
    const waiter = event.wait(5000, controller.signal)
    event.set()
    assert.equal(await waiter, true)
  }
  assert.equal(event.waiter_count, 0)
  assert.equal(getEventListeners(controller.signal, 'abort').length, 0)
  assert.ok(activeTimerCount() <= timers_before)
})

test('AsyncManualResetEvent: set/reset cycles with a signal release every listener', async () => {
  const event = new AsyncManualResetEvent()
  const controller = new AbortController()
  for (let i = 0; i < ITERATIONS; i += 1) {
    const waiter = event.wait(5000, controller.signal)
    event.set()
    assert.equal(await waiter, true)
    event.reset()
  }
  assert.equal(event.is_set, false)
  assert.equal(getEventListeners(controller.signal, 'abort').length, 0)
})

test('AsyncMessagePump: post/drain cycles leave nothing queued', async () => {
  let total = 0
  const pump = new AsyncMessagePump<number>((n) => {
    total += n
  })
  for (let i = 0; i < ITERATIONS; i += 1) {
    pump.post(1)
    await pump.drain()
  }
  assert.equal(total, ITERATIONS)
  assert.equal(pump.count, 0)
})

test('AsyncDelegatePump: sends with timeout and signal release their registrations once started', async () => {
  const pump = new AsyncDelegatePump()
  const controller = new AbortController()
  const timers_before = activeTimerCount()
  let total = 0
  for (let batch = 0; batch < 1_000; batch += 1) {
    const sends = Array.from({ length: 10 }, (_, i) => pump.send(() => i, { timeout_ms: 5000, signal: controller.signal }))
    const values = await Promise.all(sends)
    total += values.reduce((sum, value) => sum + value, 0)
  }
  await pump.drain()

  assert.equal(total, 1_000 * 45)
  assert.equal(pump.count, 0)
  assert.equal(getEventListeners(controller.signal, 'abort').length, 0)
  assert.ok(activeTimerCount() <= timers_before)
})
