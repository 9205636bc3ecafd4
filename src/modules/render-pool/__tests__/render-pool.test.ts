import { describe, it, expect } from 'vitest'
import { RenderPool } from '../render-pool.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (err: Error) => void
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (err: Error) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve: (v) => resolve(v), reject: (e) => reject(e) }
}

/** Let queued microtasks and pool bookkeeping run */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RenderPool', () => {
  it('rejects a non-positive or fractional concurrency', () => {
    expect(() => new RenderPool(0)).toThrow(RangeError)
    expect(() => new RenderPool(1.5)).toThrow('maxConcurrency must be a positive integer, got 1.5')
  })

  it('runs at most maxConcurrency tasks at once', async () => {
    const pool = new RenderPool(2)
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()]
    const started: number[] = []

    const results = gates.map((gate, i) =>
      pool.run(async () => {
        started.push(i)
        return gate.promise
      }, `job-${String(i)}`),
    )
    await flush()

    expect(started).toEqual([0, 1])
    expect(pool.stats()).toEqual({ maxConcurrency: 2, active: 2, pending: 1 })

    gates[0]?.resolve('a')
    await flush()
    expect(started).toEqual([0, 1, 2])

    gates[1]?.resolve('b')
    gates[2]?.resolve('c')
    expect(await Promise.all(results)).toEqual(['a', 'b', 'c'])
  })

  it('starts queued tasks in FIFO order', async () => {
    const pool = new RenderPool(1)
    const order: string[] = []

    await Promise.all(
      ['first', 'second', 'third'].map((name) =>
        pool.run(async () => {
          order.push(name)
        }),
      ),
    )

    expect(order).toEqual(['first', 'second', 'third'])
  })

  it('passes task rejections through and frees the slot', async () => {
    const pool = new RenderPool(1)

    await expect(pool.run(async () => Promise.reject(new Error('compile blew up')))).rejects.toThrow(
      'compile blew up'
    )
    await expect(pool.run(async () => 'next')).resolves.toBe('next')
  })

  it('turns a synchronous throw into a rejection', async () => {
    const pool = new RenderPool(1)

    await expect(
      pool.run(() => {
        throw new Error('sync failure')
      }),
    ).rejects.toThrow('sync failure')
    await flush()
    expect(pool.stats().active).toBe(0)
  })

  it('shutdown resolves immediately when idle', async () => {
    const pool = new RenderPool(1)
    await expect(pool.shutdown()).resolves.toBeUndefined()
  })

  it('shutdown waits for running and queued tasks', async () => {
    const pool = new RenderPool(1)
    const gate = deferred<void>()
    let finished = 0

    void pool.run(async () => {
      await gate.promise
      finished++
    })
    void pool.run(async () => {
      finished++
    })

    let shutDown = false
    const shutdown = pool.shutdown().then(() => {
      shutDown = true
    })
    await flush()
    expect(shutDown).toBe(false)

    gate.resolve()
    await shutdown
    expect(finished).toBe(2)
    expect(pool.stats()).toEqual({ maxConcurrency: 1, active: 0, pending: 0 })
  })
})
