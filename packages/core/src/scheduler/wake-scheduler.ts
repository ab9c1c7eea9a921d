/**
 * Wake Scheduler
 *
 * Daily wake-up policy on top of the EventLoop. Each day gets one "wake"
 * task at the default wake time, moved earlier when the day's first
 * event needs it. A recurring "maintenance" task fires at the day
 * boundary and recomputes the next wake.
 */

import { DateTime } from 'luxon'
import { z } from 'zod'
import { postJson } from '../actions/webhook.js'
import type { EventLoop } from './event-loop.js'
import { atTimeOfDay, dailyAt, parseTimeOfDay } from './recurrence.js'
import type { TimeOfDay } from './recurrence.js'
import type { CallbackRegistry } from './registry.js'
import { ScheduledTask } from './task.js'
import type {
  ActionContext,
  BoundArgs,
  EventSource,
  SchedulerEvent,
  SettingsStore,
} from './types.js'

export const WAKE_TASK_ID = 'wake'
export const MAINTENANCE_TASK_ID = 'maintenance'
export const WAKE_CATEGORY = 'wake'
export const MAINTENANCE_CATEGORY = 'maintenance'

export const WAKE_ACTION = 'wake.trigger'
export const MAINTENANCE_ACTION = 'wake.maintenance'

/** Settings keys read by the wake policy */
export const SETTING_WAKE_URL = 'wake.server_url'
export const SETTING_DEFAULT_TIME = 'wake.default_time'
export const SETTING_LEAD_MINUTES = 'wake.lead_minutes'

const DEFAULT_EVENT_LIMIT = 200
const FIRST_EVENTS_COUNT = 3

export interface WakeConfig {
  /** IANA zone the wake and maintenance times are expressed in */
  timezone: string
  /** "HH:mm" */
  defaultTime: string
  /** How long before the first event to wake up */
  leadMinutes: number
  /** "HH:mm"; wake is never moved before this */
  earliestTime: string
  /** "HH:mm" of the daily maintenance firing (midnight by default) */
  maintenanceTime: string
  webhookTimeoutMs?: number
  eventLimit?: number
}

export interface WakeSchedulerDeps {
  eventLoop: EventLoop
  eventSource: EventSource
  settings: SettingsStore
  registry: CallbackRegistry
  config: WakeConfig
}

export interface WakePlan {
  wakeAt: Date
  earliestEvent: SchedulerEvent | null
  firstEvents: SchedulerEvent[]
}

export interface WakeState {
  nextWakeAt: Date | null
  maintenanceTaskId: string | null
}

type EventSummary = { id: string; title: string; start: string }

const eventSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  start: z.string(),
})

const wakeArgsSchema = z.object({
  url: z.string().optional(),
  timezone: z.string(),
  wakeTime: z.string(),
  context: z.object({
    earliest_event: eventSummarySchema.nullable(),
    first_events: z.array(eventSummarySchema),
  }),
})

function requireTimeOfDay(value: string, field: string): TimeOfDay {
  const parsed = parseTimeOfDay(value)
  if (!parsed) {
    throw new Error(`Invalid ${field} "${value}", expected HH:mm`)
  }
  return parsed
}

function summarize(event: SchedulerEvent): EventSummary {
  return { id: event.id, title: event.title, start: event.time.toISOString() }
}

export class WakeScheduler {
  private eventLoop: EventLoop
  private eventSource: EventSource
  private settings: SettingsStore
  private config: WakeConfig
  private defaultTime: TimeOfDay
  private earliestTime: TimeOfDay
  private maintenanceTime: TimeOfDay
  private nextWakeAt: Date | null = null

  constructor(deps: WakeSchedulerDeps) {
    this.eventLoop = deps.eventLoop
    this.eventSource = deps.eventSource
    this.settings = deps.settings
    this.config = deps.config
    this.defaultTime = requireTimeOfDay(deps.config.defaultTime, 'default wake time')
    this.earliestTime = requireTimeOfDay(deps.config.earliestTime, 'earliest wake time')
    this.maintenanceTime = requireTimeOfDay(deps.config.maintenanceTime, 'maintenance time')

    deps.registry.registerAction(WAKE_ACTION, (context) => this.triggerWake(context))
    deps.registry.registerAction(MAINTENANCE_ACTION, async () => {
      await this.scheduleToday()
    })
  }

  /**
   * Compute the wake instant for the calendar day containing `day`.
   * Falls back to the default time when the event source fails.
   */
  async computeWakeTime(day: DateTime): Promise<WakePlan> {
    const dayStart = day.setZone(this.config.timezone).startOf('day')
    const dayEnd = dayStart.plus({ days: 1 })

    const defaultTime = this.readTimeSetting(SETTING_DEFAULT_TIME) ?? this.defaultTime
    const leadMinutes = this.readLeadMinutes()
    const defaultWake = atTimeOfDay(dayStart, defaultTime)
    const earliestWake = atTimeOfDay(dayStart, this.earliestTime)
    const floor = earliestWake < defaultWake ? earliestWake : defaultWake

    let events: SchedulerEvent[] = []
    try {
      const fetched = await this.eventSource.getEvents(
        this.config.eventLimit ?? DEFAULT_EVENT_LIMIT,
        dayEnd.toJSDate(),
        dayStart.toJSDate(),
      )
      events = fetched
        .filter(
          (e) =>
            e.time.getTime() >= dayStart.toMillis() &&
            e.time.getTime() < dayEnd.toMillis() &&
            e.category !== WAKE_CATEGORY &&
            e.category !== MAINTENANCE_CATEGORY,
        )
        .sort((a, b) => a.time.getTime() - b.time.getTime())
    } catch (err) {
      console.warn(
        `[WakeScheduler] Event source unavailable, using default wake time: ${err instanceof Error ? err.message : String(err)}`,
      )
    }

    const earliestEvent = events[0] ?? null
    let wakeAt = defaultWake

    if (earliestEvent) {
      const beforeEvent = DateTime.fromJSDate(earliestEvent.time, {
        zone: this.config.timezone,
      }).minus({ minutes: leadMinutes })
      if (beforeEvent < defaultWake) {
        wakeAt = beforeEvent > floor ? beforeEvent : floor
      }
    }

    return {
      wakeAt: wakeAt.toJSDate(),
      earliestEvent,
      firstEvents: events.slice(0, FIRST_EVENTS_COUNT),
    }
  }

  /**
   * Schedule the next wake: today's, or tomorrow's when today's has
   * already passed. Replaces any pending wake task.
   */
  async scheduleToday(): Promise<ScheduledTask> {
    const now = DateTime.now().setZone(this.config.timezone)

    let plan = await this.computeWakeTime(now)
    if (plan.wakeAt.getTime() <= now.toMillis()) {
      plan = await this.computeWakeTime(now.plus({ days: 1 }))
    }

    const url = this.readSetting(SETTING_WAKE_URL)
    const args: BoundArgs = {
      timezone: this.config.timezone,
      wakeTime: plan.wakeAt.toISOString(),
      context: {
        earliest_event: plan.earliestEvent ? summarize(plan.earliestEvent) : null,
        first_events: plan.firstEvents.map(summarize),
      },
    }
    if (url) {
      args.url = url
    }

    const task = new ScheduledTask({
      id: WAKE_TASK_ID,
      title: 'Wake up',
      fireTime: plan.wakeAt,
      category: WAKE_CATEGORY,
      action: { name: WAKE_ACTION, args },
    })

    this.eventLoop.addTask(task)
    this.nextWakeAt = plan.wakeAt

    console.log(
      `[WakeScheduler] Wake scheduled for ${DateTime.fromJSDate(plan.wakeAt, { zone: this.config.timezone }).toFormat('yyyy-LL-dd HH:mm ZZZZ')}` +
        (plan.earliestEvent ? ` (first event: "${plan.earliestEvent.title}")` : ''),
    )

    return task
  }

  /**
   * Admit the recurring maintenance task, replacing any live instance.
   * The EventLoop admits each successor when the current one fires.
   */
  scheduleDailyMaintenance(): ScheduledTask {
    const rule = dailyAt(this.maintenanceTime, this.config.timezone)

    const task = new ScheduledTask({
      id: MAINTENANCE_TASK_ID,
      title: 'Daily maintenance',
      fireTime: rule.next(new Date()),
      category: MAINTENANCE_CATEGORY,
      action: { name: MAINTENANCE_ACTION },
      recurrence: rule,
    })

    this.eventLoop.addTask(task)
    console.log(`[WakeScheduler] Maintenance scheduled ${rule.description}, next at ${task.fireTime.toISOString()}`)

    return task
  }

  getState(): WakeState {
    return {
      nextWakeAt: this.eventLoop.hasTask(WAKE_TASK_ID) ? this.nextWakeAt : null,
      maintenanceTaskId: this.eventLoop.hasTask(MAINTENANCE_TASK_ID) ? MAINTENANCE_TASK_ID : null,
    }
  }

  // ============================================================
  // PRIVATE METHODS
  // ============================================================

  private async triggerWake({ taskId, args }: ActionContext): Promise<void> {
    const parsed = wakeArgsSchema.safeParse(args)
    if (!parsed.success) {
      console.warn(`[WakeScheduler] Task ${taskId} has malformed wake arguments, skipping`)
      return
    }

    const { url, timezone, wakeTime, context } = parsed.data
    if (!url) {
      console.log('[WakeScheduler] No wake target configured, nothing to call')
      return
    }

    console.log(`[WakeScheduler] Calling wake target ${url}`)
    await postJson(
      url,
      { timezone, wake_time: wakeTime, context },
      { timeoutMs: this.config.webhookTimeoutMs },
    )
  }

  private readSetting(key: string): string | null {
    try {
      const value = this.settings.getString(key)
      return value && value.trim() !== '' ? value.trim() : null
    } catch (err) {
      console.warn(
        `[WakeScheduler] Could not read setting ${key}: ${err instanceof Error ? err.message : String(err)}`,
      )
      return null
    }
  }

  private readTimeSetting(key: string): TimeOfDay | null {
    const value = this.readSetting(key)
    if (value === null) return null

    const parsed = parseTimeOfDay(value)
    if (!parsed) {
      console.warn(`[WakeScheduler] Ignoring setting ${key}="${value}", expected HH:mm`)
    }
    return parsed
  }

  private readLeadMinutes(): number {
    const value = this.readSetting(SETTING_LEAD_MINUTES)
    if (value === null) return this.config.leadMinutes

    const minutes = Number(value)
    if (!Number.isFinite(minutes) || minutes < 0) {
      console.warn(`[WakeScheduler] Ignoring setting ${SETTING_LEAD_MINUTES}="${value}"`)
      return this.config.leadMinutes
    }
    return minutes
  }
}
