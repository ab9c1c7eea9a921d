/**
 * Scheduler Types
 *
 * Shared contracts for the scheduler engine and the collaborators it
 * reads from (event source, settings store).
 */

/**
 * JSON-serializable value carried in a callback binding.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type BoundArgs = { [key: string]: JsonValue }

/**
 * Reference to a registered callback plus the arguments bound to it.
 * Resolved against a CallbackRegistry at dispatch time, so tasks never
 * carry executable code.
 */
export interface CallbackBinding {
  /** Registry key */
  name: string
  args?: BoundArgs
}

export type NotifierFn = (id: string, title: string) => void | Promise<void>

export interface ActionContext {
  taskId: string
  title: string
  args: BoundArgs
}

export type ActionFn = (context: ActionContext) => void | Promise<void>

/**
 * Computes the next fire time of a recurring task.
 */
export interface RecurrenceRule {
  /** Human-readable description, used in logs and status */
  description: string

  /**
   * Next fire time strictly after `after`.
   */
  next(after: Date): Date
}

export type FiringKind = { type: 'notify'; index: number } | { type: 'action' }

/**
 * Snapshot of a pending firing, as exposed by EventLoop.getPendingFirings().
 */
export interface PendingFiringInfo {
  taskId: string
  title: string
  category: string
  dueAt: Date
  kind: FiringKind
}

/**
 * Record of a dispatched firing.
 */
export interface DispatchRecord {
  taskId: string
  title: string
  category: string
  kind: string
  dueAt: string
  dispatchedAt: string
  ok: boolean
  error?: string
}

export interface EventLoopStatus {
  running: boolean
  pendingFirings: number
  pendingTasks: number
  nextDueAt: string | null
  dispatchedCount: number
  failedCount: number
  recentlyFired: DispatchRecord[]
}

// ─── Collaborators ───

/**
 * Persisted event as exposed by the event source.
 */
export interface SchedulerEvent {
  id: string
  title: string
  description: string
  category: string
  time: Date
  /** Informational span in milliseconds */
  duration: number
  /** Notifier registry key, empty when none */
  notifierName: string
  /** Action registry key, empty when none */
  actionName: string
}

/**
 * Read-only view of persisted events.
 */
export interface EventSource {
  /**
   * Events with `from <= time <= horizon`, ordered by time ascending.
   * `from` defaults to the current time, so past rows never use up `limit`.
   *
   * @param limit - Maximum number of events returned
   */
  getEvents(limit: number, horizon: Date, from?: Date): Promise<SchedulerEvent[]>
}

/**
 * String key/value settings.
 */
export interface SettingsStore {
  getString(key: string): string | null
  setString(key: string, value: string): void
}
