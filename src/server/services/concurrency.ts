/**
 * Keyed work queue for reconciliation units
 *
 * At most `concurrency` keys run at once and a key never runs concurrently with
 * itself: a key enqueued while it is running is run again once it finishes.
 */

import type { Logger } from './logger'
import { errorMessage } from './errors'

export interface ReconcileResult {
  requeueAfter?: number
}

export type ReconcileHandler = (key: string) => Promise<ReconcileResult | void>

export interface WorkQueueOptions {
  concurrency: number
  errorDelayMs: number
  log: Logger
}

export class WorkQueue {
  private pending: string[] = []
  private queued = new Set<string>()
  private running = new Set<string>()
  private rerun = new Set<string>()
  private timers = new Map<string, NodeJS.Timeout>()
  private inflight = new Set<Promise<void>>()
  private stopped = false

  constructor(private handler: ReconcileHandler, private options: WorkQueueOptions) {}

  enqueue(key: string): void {
    if (this.stopped) return

    if (this.running.has(key)) {
      this.rerun.add(key)
      return
    }
    if (this.queued.has(key)) return

    this.queued.add(key)
    this.pending.push(key)
    this.runNext()
  }

  // Schedules a key after a delay; an earlier schedule for the same key wins
  enqueueAfter(key: string, delayMs: number): void {
    if (this.stopped) return
    if (delayMs <= 0) {
      this.enqueue(key)
      return
    }

    const existing = this.timers.get(key)
    if (existing) return

    const timer = setTimeout(() => {
      this.timers.delete(key)
      this.enqueue(key)
    }, delayMs)
    timer.unref()
    this.timers.set(key, timer)
  }

  get size(): number {
    return this.pending.length + this.running.size
  }

  // Resolves once nothing is pending or running (scheduled timers excluded)
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight])
    }
  }

  async shutdown(): Promise<void> {
    this.stopped = true
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
    this.pending = []
    this.queued.clear()
    this.rerun.clear()
    await this.drain()
  }

  private runNext(): void {
    while (this.running.size < this.options.concurrency && this.pending.length > 0) {
      const index = this.pending.findIndex(key => !this.running.has(key))
      if (index === -1) return

      const [key] = this.pending.splice(index, 1)
      this.queued.delete(key)
      this.running.add(key)

      const task = this.process(key).finally(() => {
        this.inflight.delete(task)
        this.running.delete(key)
        if (this.rerun.delete(key)) {
          this.enqueue(key)
        }
        this.runNext()
      })
      this.inflight.add(task)
    }
  }

  private async process(key: string): Promise<void> {
    try {
      const result = await this.handler(key)
      if (result?.requeueAfter !== undefined) {
        this.enqueueAfter(key, result.requeueAfter)
      }
    } catch (err) {
      this.options.log.error('reconcile failed, rescheduling', { key, error: errorMessage(err) })
      this.enqueueAfter(key, this.options.errorDelayMs)
    }
  }
}
