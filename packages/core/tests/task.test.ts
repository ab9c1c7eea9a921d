/**
 * Unit Tests: Scheduled Tasks, Callback Registry, Pending Queue
 */

import { describe, it, expect, vi, afterEach } from 'vitest'

import { ScheduledTask, InvalidTaskError, DEFAULT_CATEGORY } from '../src/scheduler/task.js'
import { CallbackRegistry, resolveTaskCallbacks } from '../src/scheduler/registry.js'
import { PendingQueue } from '../src/scheduler/pending-queue.js'
import type { PendingFiring } from '../src/scheduler/pending-queue.js'
import type { ActionContext, RecurrenceRule } from '../src/scheduler/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const BASE = Date.parse('2026-03-01T12:00:00.000Z')

function at(offsetMs: number): Date {
  return new Date(BASE + offsetMs)
}

function task(id: string, offsetMs = 60_000): ScheduledTask {
  return new ScheduledTask({ id, title: id, fireTime: at(offsetMs) })
}

function firing(t: ScheduledTask, dueAt: number, seq: number): PendingFiring {
  return { task: t, dueAt, kind: { type: 'action' }, seq }
}

// -------------------------------------------------------------------
// ScheduledTask
// -------------------------------------------------------------------

describe('ScheduledTask', () => {
  it('applies defaults', () => {
    const t = new ScheduledTask({ id: 'a', title: 'A', fireTime: at(0) })

    expect(t.description).toBe('')
    expect(t.duration).toBe(0)
    expect(t.notifyTimes).toEqual([])
    expect(t.notifier).toBeNull()
    expect(t.action).toBeNull()
    expect(t.notifierName).toBe('')
    expect(t.actionName).toBe('')
    expect(t.category).toBe(DEFAULT_CATEGORY)
    expect(t.recurrence).toBeNull()
  })

  it('sorts notify times ascending', () => {
    const t = new ScheduledTask({
      id: 'a',
      title: 'A',
      fireTime: at(60_000),
      notifyTimes: [at(30_000), at(10_000), at(20_000)],
    })

    expect(t.notifyTimes.map((d) => d.getTime())).toEqual([BASE + 10_000, BASE + 20_000, BASE + 30_000])
  })

  it('rejects an empty id', () => {
    expect(() => new ScheduledTask({ id: '  ', title: 'A', fireTime: at(0) })).toThrow(InvalidTaskError)
  })

  it('rejects an invalid fire time', () => {
    expect(() => new ScheduledTask({ id: 'a', title: 'A', fireTime: new Date(NaN) })).toThrow(
      'Task a has an invalid fire time',
    )
  })

  it('rejects a notify time at or after the fire time', () => {
    expect(
      () => new ScheduledTask({ id: 'a', title: 'A', fireTime: at(0), notifyTimes: [at(0)] }),
    ).toThrow(InvalidTaskError)
    expect(
      () => new ScheduledTask({ id: 'a', title: 'A', fireTime: at(0), notifyTimes: [at(1)] }),
    ).toThrow(InvalidTaskError)
  })

  it('treats empty callback names as unbound', () => {
    const t = new ScheduledTask({
      id: 'a',
      title: 'A',
      fireTime: at(0),
      notifier: { name: '' },
      action: { name: '' },
    })

    expect(t.notifier).toBeNull()
    expect(t.action).toBeNull()
  })

  it('copies inputs so later mutation has no effect', () => {
    const fire = at(60_000)
    const notify = [at(0)]
    const t = new ScheduledTask({ id: 'a', title: 'A', fireTime: fire, notifyTimes: notify })

    fire.setTime(0)
    notify.push(at(30_000))

    expect(t.fireTime.getTime()).toBe(BASE + 60_000)
    expect(t.notifyTimes).toHaveLength(1)
  })

  it('returns no successor when it does not recur', () => {
    expect(task('a').nextOccurrence(at(0))).toBeNull()
  })

  it('builds a successor that keeps notify offsets', () => {
    const hourly: RecurrenceRule = {
      description: 'hourly',
      next: (after) => new Date(after.getTime() + 3_600_000),
    }
    const t = new ScheduledTask({
      id: 'r',
      title: 'Recurring',
      fireTime: at(0),
      notifyTimes: [at(-300_000)],
      action: { name: 'hello', args: { n: 1 } },
      category: 'maintenance',
      recurrence: hourly,
    })

    const next = t.nextOccurrence(at(0))

    expect(next).not.toBeNull()
    expect(next?.id).toBe('r')
    expect(next?.fireTime.getTime()).toBe(BASE + 3_600_000)
    expect(next?.notifyTimes.map((d) => d.getTime())).toEqual([BASE + 3_600_000 - 300_000])
    expect(next?.action).toEqual({ name: 'hello', args: { n: 1 } })
    expect(next?.category).toBe('maintenance')
    expect(next?.recurrence).toBe(hourly)
  })
})

// -------------------------------------------------------------------
// CallbackRegistry
// -------------------------------------------------------------------

describe('CallbackRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('registers and looks up callbacks by name', () => {
    const registry = new CallbackRegistry()
    const notifier = vi.fn()
    const action = vi.fn()

    registry.registerNotifier('console', notifier)
    registry.registerAction('hello', action)

    expect(registry.getNotifier('console')).toBe(notifier)
    expect(registry.getAction('hello')).toBe(action)
    expect(registry.hasNotifier('missing')).toBe(false)
    expect(registry.getAction('missing')).toBeUndefined()
  })

  it('lists names sorted', () => {
    const registry = new CallbackRegistry()
    registry.registerAction('zeta', vi.fn())
    registry.registerAction('alpha', vi.fn())

    expect(registry.actionNames()).toEqual(['alpha', 'zeta'])
    expect(registry.notifierNames()).toEqual([])
  })

  it('rejects empty names', () => {
    const registry = new CallbackRegistry()
    expect(() => registry.registerNotifier('', vi.fn())).toThrow('Notifier name must not be empty')
    expect(() => registry.registerAction('', vi.fn())).toThrow('Action name must not be empty')
  })

  it('replaces a duplicate registration with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const registry = new CallbackRegistry()
    const second = vi.fn()

    registry.registerAction('hello', vi.fn())
    registry.registerAction('hello', second)

    expect(registry.getAction('hello')).toBe(second)
    expect(warn).toHaveBeenCalledWith('[Registry] Replacing action "hello"')
  })

  it('resolves bindings with the task id, title and bound args', async () => {
    const registry = new CallbackRegistry()
    const notifier = vi.fn()
    const calls: ActionContext[] = []
    registry.registerNotifier('console', notifier)
    registry.registerAction('hello', (ctx) => {
      calls.push(ctx)
    })

    const t = new ScheduledTask({
      id: 't1',
      title: 'Standup',
      fireTime: at(0),
      notifier: { name: 'console' },
      action: { name: 'hello', args: { room: 'B' } },
    })
    const callbacks = resolveTaskCallbacks(t, registry)
    await callbacks.notify()
    await callbacks.action()

    expect(notifier).toHaveBeenCalledWith('t1', 'Standup')
    expect(calls).toEqual([{ taskId: 't1', title: 'Standup', args: { room: 'B' } }])
  })

  it('resolves unknown names and missing bindings to no-ops', async () => {
    const registry = new CallbackRegistry()
    const t = new ScheduledTask({
      id: 't1',
      title: 'Orphan',
      fireTime: at(0),
      action: { name: 'not-registered' },
    })

    const callbacks = resolveTaskCallbacks(t, registry)

    await expect(callbacks.notify()).resolves.toBeUndefined()
    await expect(callbacks.action()).resolves.toBeUndefined()
  })
})

// -------------------------------------------------------------------
// PendingQueue
// -------------------------------------------------------------------

describe('PendingQueue', () => {
  it('pops in due order, breaking ties by admission order', () => {
    const queue = new PendingQueue()
    const a = task('a')
    const b = task('b')
    const c = task('c')
    const d = task('d')

    queue.push(firing(c, 300, 0))
    queue.push(firing(a, 100, 1))
    queue.push(firing(d, 300, 2))
    queue.push(firing(b, 100, 3))

    const order: string[] = []
    let next = queue.pop()
    while (next) {
      order.push(next.task.id)
      next = queue.pop()
    }

    expect(order).toEqual(['a', 'b', 'c', 'd'])
    expect(queue.size).toBe(0)
  })

  it('removes matching firings and keeps heap order', () => {
    const queue = new PendingQueue()
    const keep = task('keep')
    const drop = task('drop')
    for (let i = 0; i < 10; i++) {
      queue.push(firing(i % 2 === 0 ? keep : drop, 1000 - i * 10, i))
    }

    const removed = queue.removeWhere((f) => f.task.id === 'drop')

    expect(removed).toBe(5)
    expect(queue.some((f) => f.task.id === 'drop')).toBe(false)
    expect(queue.toSortedArray().map((f) => f.dueAt)).toEqual([920, 940, 960, 980, 1000])
    expect(queue.peek()?.dueAt).toBe(920)
  })

  it('returns undefined when empty', () => {
    const queue = new PendingQueue()
    expect(queue.peek()).toBeUndefined()
    expect(queue.pop()).toBeUndefined()
  })
})
