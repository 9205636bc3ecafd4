/**
 * RenderPool: bounded concurrency for render calls.
 *
 * Each render call is one unit of work. At most `maxConcurrency` run at once;
 * the rest wait in FIFO order. Compiler passes of a single job stay
 * sequential because they execute inside one unit.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('render-pool')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Snapshot of the pool's occupancy.
 */
export interface RenderPoolStats {
  maxConcurrency: number
  active: number
  pending: number
}

interface QueuedTask {
  label: string
  start: () => void
}

// ---------------------------------------------------------------------------
// RenderPool
// ---------------------------------------------------------------------------

export class RenderPool {
  readonly maxConcurrency: number

  private _active = 0
  private readonly _queue: QueuedTask[] = []
  private _idleWaiters: Array<() => void> = []

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`)
    }
    this.maxConcurrency = maxConcurrency
  }

  /**
   * Resolve once every queued and running task has settled.
   */
  async shutdown(): Promise<void> {
    logger.debug(this.stats(), 'RenderPool.shutdown()')
    if (this._active === 0 && this._queue.length === 0) return
    await new Promise<void>((resolve) => {
      this._idleWaiters.push(resolve)
    })
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Run `task` when a slot is free and settle with its result.
   *
   * @param task  - Work to run; its rejection is passed through unchanged
   * @param label - Identifier used in log lines (e.g. the job name)
   */
  run<T>(task: () => Promise<T>, label = 'render'): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this._active++
        logger.debug({ label, ...this.stats() }, 'Render task started')
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this._active--
            this._drain()
          })
      }

      if (this._active < this.maxConcurrency) {
        start()
      } else {
        logger.debug({ label, ...this.stats() }, 'Render task queued')
        this._queue.push({ label, start })
      }
    })
  }

  stats(): RenderPoolStats {
    return {
      maxConcurrency: this.maxConcurrency,
      active: this._active,
      pending: this._queue.length,
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _drain(): void {
    while (this._active < this.maxConcurrency && this._queue.length > 0) {
      const next = this._queue.shift()
      next?.start()
    }

    if (this._active === 0 && this._queue.length === 0 && this._idleWaiters.length > 0) {
      const waiters = this._idleWaiters
      this._idleWaiters = []
      for (const waiter of waiters) waiter()
    }
  }
}
