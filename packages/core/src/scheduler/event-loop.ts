/**
 * Event Loop
 *
 * Holds every pending firing and dispatches each one at or after its due
 * time from a single background loop.
 *
 * The loop sleeps until the earliest firing is due or until it is woken
 * early by an admission that moves the earliest due time forward. Queue
 * mutations are synchronous, so addTask/cancelTask never wait on a
 * callback; callbacks are awaited one at a time, outside any mutation.
 */

import { EventEmitter } from 'node:events'
import { PendingQueue } from './pending-queue.js'
import type { PendingFiring } from './pending-queue.js'
import { resolveTaskCallbacks } from './registry.js'
import type { CallbackRegistry } from './registry.js'
import type { ScheduledTask } from './task.js'
import type {
  DispatchRecord,
  EventLoopStatus,
  FiringKind,
  PendingFiringInfo,
} from './types.js'

/** setTimeout stores its delay as a signed 32-bit integer */
const MAX_TIMER_DELAY_MS = 2_147_483_647
const MAX_RECENT_FIRED = 10

export interface EventLoopConfig {
  registry: CallbackRegistry
}

export function describeKind(kind: FiringKind): string {
  return kind.type === 'notify' ? `notify-${kind.index}` : 'action'
}

/**
 * EventLoop events:
 * - `firing:dispatched` (DispatchRecord) after a callback completed
 * - `firing:failed` (DispatchRecord) after a callback threw or rejected
 */
export class EventLoop extends EventEmitter {
  private registry: CallbackRegistry
  private queue = new PendingQueue()
  private seq = 0
  private running = false
  private loop: Promise<void> | null = null
  /** Bumped by every start(); a run from an older start exits */
  private generation = 0
  private wakeWaiter: (() => void) | null = null
  /** Due time the loop is sleeping towards; null while idle or not waiting */
  private waitingUntil: number | null = null
  private dispatchedCount = 0
  private failedCount = 0
  private recentlyFired: DispatchRecord[] = []

  constructor(config: EventLoopConfig) {
    super()
    this.registry = config.registry
  }

  /**
   * Start the dispatch loop. A second call while running is a no-op.
   * Called while a stop is still winding down, the new run waits for
   * the old one to exit, so only one loop ever dispatches.
   */
  start(): void {
    if (this.running) {
      console.warn('[EventLoop] Already running')
      return
    }

    this.running = true
    const generation = ++this.generation
    console.log(`[EventLoop] Started with ${this.queue.size} pending firing(s)`)

    const previous = this.loop
    const started = previous ? previous.then(() => this.run(generation)) : this.run(generation)
    const loop: Promise<void> = started
      .catch((err) => {
        console.error('[EventLoop] Dispatch loop crashed:', err)
      })
      .finally(() => {
        if (this.loop !== loop) return
        this.running = false
        this.loop = null
        console.log('[EventLoop] Stopped')
      })
    this.loop = loop
  }

  /**
   * Stop the dispatch loop.
   * Resolves once the in-flight callback (if any) has finished and the
   * loop has exited. Must not be awaited from inside a callback of this
   * loop.
   */
  async stop(): Promise<void> {
    this.running = false
    this.signal()
    if (this.loop) {
      await this.loop
    }
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Admit a task's notify firings and its action firing.
   * A task whose id is still pending is replaced.
   */
  addTask(task: ScheduledTask): void {
    const replaced = this.queue.removeWhere((f) => f.task.id === task.id)
    if (replaced > 0) {
      console.log(`[EventLoop] Replacing pending task ${task.id} (${replaced} firing(s))`)
    }
    this.admit(task)
  }

  /**
   * Remove every pending firing of a task. Unknown ids are a no-op.
   * A firing already being dispatched still completes.
   *
   * @returns Number of firings removed
   */
  cancelTask(id: string): number {
    const removed = this.queue.removeWhere((f) => f.task.id === id)
    if (removed > 0) {
      console.log(`[EventLoop] Cancelled task ${id} (${removed} firing(s))`)
    }
    return removed
  }

  hasTask(id: string): boolean {
    return this.queue.some((f) => f.task.id === id)
  }

  get pendingCount(): number {
    return this.queue.size
  }

  /**
   * Pending firings in dispatch order.
   */
  getPendingFirings(): PendingFiringInfo[] {
    return this.queue.toSortedArray().map((f) => ({
      taskId: f.task.id,
      title: f.task.title,
      category: f.task.category,
      dueAt: new Date(f.dueAt),
      kind: f.kind,
    }))
  }

  getStatus(): EventLoopStatus {
    const next = this.queue.peek()
    const taskIds = new Set(this.queue.toSortedArray().map((f) => f.task.id))

    return {
      running: this.running,
      pendingFirings: this.queue.size,
      pendingTasks: taskIds.size,
      nextDueAt: next ? new Date(next.dueAt).toISOString() : null,
      dispatchedCount: this.dispatchedCount,
      failedCount: this.failedCount,
      recentlyFired: [...this.recentlyFired],
    }
  }

  // ============================================================
  // PRIVATE METHODS
  // ============================================================

  private admit(task: ScheduledTask): void {
    task.notifyTimes.forEach((time, index) => {
      this.queue.push({
        task,
        dueAt: time.getTime(),
        kind: { type: 'notify', index },
        seq: this.seq++,
      })
    })
    this.queue.push({
      task,
      dueAt: task.fireTime.getTime(),
      kind: { type: 'action' },
      seq: this.seq++,
    })

    const earliest = task.notifyTimes[0]?.getTime() ?? task.fireTime.getTime()
    if (this.wakeWaiter && (this.waitingUntil === null || earliest < this.waitingUntil)) {
      this.signal()
    }
  }

  private async run(generation: number): Promise<void> {
    while (this.running && generation === this.generation) {
      const next = this.queue.peek()

      if (!next) {
        await this.waitForWake(null)
        continue
      }

      if (next.dueAt > Date.now()) {
        await this.waitForWake(next.dueAt)
        continue
      }

      const firing = this.queue.pop()
      if (firing) {
        await this.dispatch(firing)
      }
    }
  }

  /**
   * Sleep until `until` (epoch ms) or until signal() is called.
   * Waking early or on a capped timer is fine: the loop re-evaluates.
   */
  private waitForWake(until: number | null): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null

      const wake = (): void => {
        if (timer) clearTimeout(timer)
        if (this.wakeWaiter === wake) {
          this.wakeWaiter = null
          this.waitingUntil = null
        }
        resolve()
      }

      if (until !== null) {
        const delay = Math.min(Math.max(until - Date.now(), 0), MAX_TIMER_DELAY_MS)
        timer = setTimeout(wake, delay)
      }

      this.wakeWaiter = wake
      this.waitingUntil = until
    })
  }

  private signal(): void {
    this.wakeWaiter?.()
  }

  private async dispatch(firing: PendingFiring): Promise<void> {
    const { task, kind } = firing

    // Successor goes in before the callback runs, so a recurring task
    // always has exactly one live instance.
    if (kind.type === 'action' && task.recurrence) {
      this.admitSuccessor(task)
    }

    const label = describeKind(kind)
    const callbacks = resolveTaskCallbacks(task, this.registry)
    const record: DispatchRecord = {
      taskId: task.id,
      title: task.title,
      category: task.category,
      kind: label,
      dueAt: new Date(firing.dueAt).toISOString(),
      dispatchedAt: new Date().toISOString(),
      ok: true,
    }

    try {
      if (kind.type === 'action') {
        await callbacks.action()
      } else {
        await callbacks.notify()
      }
      this.dispatchedCount++
    } catch (err) {
      this.failedCount++
      record.ok = false
      record.error = err instanceof Error ? err.message : String(err)
      console.error(`[EventLoop] ${label} callback failed for task ${task.id}:`, err)
    }

    this.recentlyFired.unshift(record)
    if (this.recentlyFired.length > MAX_RECENT_FIRED) {
      this.recentlyFired.pop()
    }

    this.publish(record.ok ? 'firing:dispatched' : 'firing:failed', record)
  }

  private admitSuccessor(task: ScheduledTask): void {
    try {
      const after = new Date(Math.max(Date.now(), task.fireTime.getTime()))
      const successor = task.nextOccurrence(after)
      if (successor) {
        this.admit(successor)
      }
    } catch (err) {
      console.error(`[EventLoop] Could not compute next occurrence of task ${task.id}:`, err)
    }
  }

  private publish(event: 'firing:dispatched' | 'firing:failed', record: DispatchRecord): void {
    try {
      this.emit(event, record)
    } catch (err) {
      console.error(`[EventLoop] Listener for ${event} threw:`, err)
    }
  }
}
