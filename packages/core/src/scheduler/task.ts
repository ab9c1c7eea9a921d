/**
 * Scheduled Task
 *
 * Immutable description of one schedulable unit: an action at `fireTime`
 * and zero or more notifications before it.
 */

import type { CallbackBinding, RecurrenceRule } from './types.js'

export const DEFAULT_CATEGORY = 'task'

/**
 * Thrown when a task is malformed (caller bug). Never raised for
 * runtime failures of callbacks or collaborators.
 */
export class InvalidTaskError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidTaskError'
  }
}

export interface ScheduledTaskInit {
  id: string
  title: string
  description?: string
  fireTime: Date
  /** Informational span in milliseconds */
  duration?: number
  notifyTimes?: Date[]
  notifier?: CallbackBinding
  action?: CallbackBinding
  category?: string
  recurrence?: RecurrenceRule
}

export class ScheduledTask {
  readonly id: string
  readonly title: string
  readonly description: string
  readonly fireTime: Date
  readonly duration: number
  readonly notifyTimes: readonly Date[]
  readonly notifier: CallbackBinding | null
  readonly action: CallbackBinding | null
  readonly category: string
  readonly recurrence: RecurrenceRule | null

  constructor(init: ScheduledTaskInit) {
    if (!init.id || init.id.trim() === '') {
      throw new InvalidTaskError('Task id must not be empty')
    }
    if (Number.isNaN(init.fireTime.getTime())) {
      throw new InvalidTaskError(`Task ${init.id} has an invalid fire time`)
    }

    const fireMs = init.fireTime.getTime()
    const notifyTimes = (init.notifyTimes ?? [])
      .map((t) => new Date(t.getTime()))
      .sort((a, b) => a.getTime() - b.getTime())

    for (const t of notifyTimes) {
      if (Number.isNaN(t.getTime())) {
        throw new InvalidTaskError(`Task ${init.id} has an invalid notify time`)
      }
      if (t.getTime() >= fireMs) {
        throw new InvalidTaskError(
          `Task ${init.id}: notify time ${t.toISOString()} is not before fire time ${init.fireTime.toISOString()}`,
        )
      }
    }

    this.id = init.id
    this.title = init.title
    this.description = init.description ?? ''
    this.fireTime = new Date(fireMs)
    this.duration = init.duration ?? 0
    this.notifyTimes = Object.freeze(notifyTimes)
    this.notifier = init.notifier?.name ? { ...init.notifier } : null
    this.action = init.action?.name ? { ...init.action } : null
    this.category = init.category ?? DEFAULT_CATEGORY
    this.recurrence = init.recurrence ?? null
  }

  get notifierName(): string {
    return this.notifier?.name ?? ''
  }

  get actionName(): string {
    return this.action?.name ?? ''
  }

  /**
   * Build the following occurrence of a recurring task.
   * Notify times keep their offsets from the fire time.
   *
   * @param after - Lower bound for the next fire time
   * @returns The successor, or null when the task does not recur
   */
  nextOccurrence(after: Date): ScheduledTask | null {
    if (!this.recurrence) return null

    const nextFire = this.recurrence.next(after)
    const shift = nextFire.getTime() - this.fireTime.getTime()

    return new ScheduledTask({
      id: this.id,
      title: this.title,
      description: this.description,
      fireTime: nextFire,
      duration: this.duration,
      notifyTimes: this.notifyTimes.map((t) => new Date(t.getTime() + shift)),
      notifier: this.notifier ?? undefined,
      action: this.action ?? undefined,
      category: this.category,
      recurrence: this.recurrence,
    })
  }
}
