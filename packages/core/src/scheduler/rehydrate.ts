/**
 * Startup Rehydration
 *
 * Rebuilds pending tasks from persisted events so schedules survive a
 * restart. Callbacks are referenced by registry name, so a task resumes
 * with the same behaviour as long as the name is still registered.
 */

import type { EventLoop } from './event-loop.js'
import type { CallbackRegistry } from './registry.js'
import { ScheduledTask } from './task.js'
import type { EventSource, SchedulerEvent } from './types.js'

const DEFAULT_LIMIT = 1000
const DEFAULT_HORIZON_MS = 365 * 24 * 60 * 60 * 1000
const DEFAULT_NOTIFY_LEAD_MS = 10 * 60 * 1000
const DEFAULT_CATEGORIES = ['task']

export interface RehydrateOptions {
  eventSource: EventSource
  eventLoop: EventLoop
  registry: CallbackRegistry
  now?: Date
  horizonMs?: number
  limit?: number
  /** Offset of the single pre-notification (default: 10 minutes) */
  notifyLeadMs?: number
  /** Categories managed by the scheduler (default: ["task"]) */
  categories?: string[]
}

/**
 * Build the task for one persisted event. The pre-notification is
 * dropped when its instant is not after `now`.
 */
export function taskFromEvent(
  event: SchedulerEvent,
  now: Date,
  notifyLeadMs: number = DEFAULT_NOTIFY_LEAD_MS,
): ScheduledTask {
  const notifyAt = new Date(event.time.getTime() - notifyLeadMs)
  const notifyTimes = notifyLeadMs > 0 && notifyAt.getTime() > now.getTime() ? [notifyAt] : []

  return new ScheduledTask({
    id: event.id,
    title: event.title,
    description: event.description,
    fireTime: event.time,
    duration: event.duration,
    notifyTimes,
    notifier: event.notifierName ? { name: event.notifierName } : undefined,
    action: event.actionName ? { name: event.actionName } : undefined,
    category: event.category,
  })
}

/**
 * Admit every future scheduler-managed event into the EventLoop.
 * A failing event source counts as zero results.
 *
 * @returns The admitted tasks, in event order
 */
export async function rehydrateTasks(options: RehydrateOptions): Promise<ScheduledTask[]> {
  const { eventSource, eventLoop, registry } = options
  const now = options.now ?? new Date()
  const horizon = new Date(now.getTime() + (options.horizonMs ?? DEFAULT_HORIZON_MS))
  const categories = new Set(options.categories ?? DEFAULT_CATEGORIES)

  let events: SchedulerEvent[]
  try {
    events = await eventSource.getEvents(options.limit ?? DEFAULT_LIMIT, horizon, now)
  } catch (err) {
    console.error('[Rehydrate] Could not load persisted events, starting empty:', err)
    return []
  }

  const admitted: ScheduledTask[] = []

  for (const event of events) {
    if (!categories.has(event.category) || event.time.getTime() <= now.getTime()) {
      continue
    }

    if (event.notifierName && !registry.hasNotifier(event.notifierName)) {
      console.warn(`[Rehydrate] Event ${event.id}: notifier "${event.notifierName}" is not registered`)
    }
    if (event.actionName && !registry.hasAction(event.actionName)) {
      console.warn(`[Rehydrate] Event ${event.id}: action "${event.actionName}" is not registered`)
    }

    try {
      const task = taskFromEvent(event, now, options.notifyLeadMs)
      eventLoop.addTask(task)
      admitted.push(task)
    } catch (err) {
      console.error(`[Rehydrate] Skipping event ${event.id}:`, err)
    }
  }

  console.log(`[Rehydrate] Restored ${admitted.length} task(s) from ${events.length} event(s)`)
  return admitted
}
