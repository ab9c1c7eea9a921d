/**
 * Callback Registry
 *
 * Maps stable names to notifier and action callbacks so tasks can refer
 * to behaviour by name and survive a restart. One instance is created at
 * startup and injected wherever lookups happen; registration is expected
 * to finish before the EventLoop starts.
 */

import type { ScheduledTask } from './task.js'
import type { ActionFn, NotifierFn } from './types.js'

export interface ResolvedCallbacks {
  notify: () => Promise<void>
  action: () => Promise<void>
}

export class CallbackRegistry {
  private notifiers = new Map<string, NotifierFn>()
  private actions = new Map<string, ActionFn>()

  registerNotifier(name: string, fn: NotifierFn): void {
    if (!name) {
      throw new Error('Notifier name must not be empty')
    }
    if (this.notifiers.has(name)) {
      console.warn(`[Registry] Replacing notifier "${name}"`)
    }
    this.notifiers.set(name, fn)
  }

  registerAction(name: string, fn: ActionFn): void {
    if (!name) {
      throw new Error('Action name must not be empty')
    }
    if (this.actions.has(name)) {
      console.warn(`[Registry] Replacing action "${name}"`)
    }
    this.actions.set(name, fn)
  }

  getNotifier(name: string): NotifierFn | undefined {
    return this.notifiers.get(name)
  }

  getAction(name: string): ActionFn | undefined {
    return this.actions.get(name)
  }

  hasNotifier(name: string): boolean {
    return this.notifiers.has(name)
  }

  hasAction(name: string): boolean {
    return this.actions.has(name)
  }

  notifierNames(): string[] {
    return Array.from(this.notifiers.keys()).sort()
  }

  actionNames(): string[] {
    return Array.from(this.actions.keys()).sort()
  }
}

const noop = async (): Promise<void> => {}

/**
 * Resolve a task's bindings into zero-argument callbacks.
 * Missing bindings and unknown names resolve to no-ops.
 */
export function resolveTaskCallbacks(
  task: ScheduledTask,
  registry: CallbackRegistry,
): ResolvedCallbacks {
  const notifier = task.notifier ? registry.getNotifier(task.notifier.name) : undefined
  const action = task.action ? registry.getAction(task.action.name) : undefined
  const args = task.action?.args ?? {}

  return {
    notify: notifier
      ? async () => {
          await notifier(task.id, task.title)
        }
      : noop,
    action: action
      ? async () => {
          await action({ taskId: task.id, title: task.title, args })
        }
      : noop,
  }
}
