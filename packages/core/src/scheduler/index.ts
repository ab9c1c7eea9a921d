/**
 * Scheduler Engine: Module Exports
 */

export type {
  JsonValue,
  BoundArgs,
  CallbackBinding,
  NotifierFn,
  ActionContext,
  ActionFn,
  RecurrenceRule,
  FiringKind,
  PendingFiringInfo,
  DispatchRecord,
  EventLoopStatus,
  SchedulerEvent,
  EventSource,
  SettingsStore,
} from './types.js'

export { ScheduledTask, InvalidTaskError, DEFAULT_CATEGORY } from './task.js'
export type { ScheduledTaskInit } from './task.js'
export { CallbackRegistry, resolveTaskCallbacks } from './registry.js'
export type { ResolvedCallbacks } from './registry.js'
export { EventLoop, describeKind } from './event-loop.js'
export type { EventLoopConfig } from './event-loop.js'
export {
  parseTimeOfDay,
  formatTimeOfDay,
  nextDailyOccurrence,
  dailyAt,
} from './recurrence.js'
export type { TimeOfDay } from './recurrence.js'
export {
  WakeScheduler,
  WAKE_TASK_ID,
  MAINTENANCE_TASK_ID,
  WAKE_CATEGORY,
  MAINTENANCE_CATEGORY,
  WAKE_ACTION,
  MAINTENANCE_ACTION,
  SETTING_WAKE_URL,
  SETTING_DEFAULT_TIME,
  SETTING_LEAD_MINUTES,
} from './wake-scheduler.js'
export type { WakeConfig, WakeSchedulerDeps, WakePlan, WakeState } from './wake-scheduler.js'
export { rehydrateTasks, taskFromEvent } from './rehydrate.js'
export type { RehydrateOptions } from './rehydrate.js'
