/**
 * Pending Queue
 *
 * Binary min-heap of pending firings ordered by (dueAt, seq). `seq` is
 * the admission counter, so firings sharing a due time come out in the
 * order they were admitted.
 */

import type { ScheduledTask } from './task.js'
import type { FiringKind } from './types.js'

export interface PendingFiring {
  task: ScheduledTask
  /** Epoch milliseconds */
  dueAt: number
  kind: FiringKind
  seq: number
}

function before(a: PendingFiring, b: PendingFiring): boolean {
  return a.dueAt < b.dueAt || (a.dueAt === b.dueAt && a.seq < b.seq)
}

export class PendingQueue {
  private heap: PendingFiring[] = []

  get size(): number {
    return this.heap.length
  }

  push(firing: PendingFiring): void {
    this.heap.push(firing)
    this.siftUp(this.heap.length - 1)
  }

  peek(): PendingFiring | undefined {
    return this.heap[0]
  }

  pop(): PendingFiring | undefined {
    const top = this.heap[0]
    const last = this.heap.pop()
    if (top === undefined || last === undefined) return undefined

    if (this.heap.length > 0) {
      this.heap[0] = last
      this.siftDown(0)
    }
    return top
  }

  /**
   * Remove every firing matching the predicate.
   *
   * @returns Number of firings removed
   */
  removeWhere(predicate: (firing: PendingFiring) => boolean): number {
    const kept = this.heap.filter((f) => !predicate(f))
    const removed = this.heap.length - kept.length
    if (removed > 0) {
      this.heap = kept
      for (let i = Math.floor(this.heap.length / 2) - 1; i >= 0; i--) {
        this.siftDown(i)
      }
    }
    return removed
  }

  some(predicate: (firing: PendingFiring) => boolean): boolean {
    return this.heap.some(predicate)
  }

  /** Firings in dispatch order (copy) */
  toSortedArray(): PendingFiring[] {
    return [...this.heap].sort((a, b) => (before(a, b) ? -1 : before(b, a) ? 1 : 0))
  }

  clear(): void {
    this.heap = []
  }

  private siftUp(index: number): void {
    let i = index
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!before(this.heap[i], this.heap[parent])) break
      this.swap(i, parent)
      i = parent
    }
  }

  private siftDown(index: number): void {
    let i = index
    const n = this.heap.length
    while (true) {
      const left = 2 * i + 1
      const right = left + 1
      let smallest = i
      if (left < n && before(this.heap[left], this.heap[smallest])) smallest = left
      if (right < n && before(this.heap[right], this.heap[smallest])) smallest = right
      if (smallest === i) return
      this.swap(i, smallest)
      i = smallest
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a]
    this.heap[a] = this.heap[b]
    this.heap[b] = tmp
  }
}
