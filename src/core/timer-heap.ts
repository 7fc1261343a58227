import type { TimerTask } from './task.js';

/**
 * Binary min-heap of timers keyed by (dueTime, sequence).
 *
 * Equal due times come out in submission order. Cancelled timers are removed
 * eagerly so `size` always reflects runnable work.
 */
export class TimerHeap {
  private items: TimerTask[] = [];

  get size(): number {
    return this.items.length;
  }

  push(task: TimerTask): void {
    this.items.push(task);
    this.bubbleUp(this.items.length - 1);
  }

  peek(): TimerTask | undefined {
    return this.items[0];
  }

  pop(): TimerTask | undefined {
    const top = this.items[0];
    const end = this.items.pop();
    if (top === undefined || end === undefined) return undefined;
    if (this.items.length > 0) {
      this.items[0] = end;
      this.bubbleDown(0);
    }
    return top;
  }

  /** Removes the timer with the given id. Returns the removed task, if any. */
  remove(id: number): TimerTask | undefined {
    const index = this.items.findIndex((task) => task.id === id);
    if (index === -1) return undefined;

    const removed = this.items[index];
    const end = this.items.pop();
    if (end !== undefined && index < this.items.length) {
      this.items[index] = end;
      this.bubbleDown(index);
      this.bubbleUp(index);
    }
    return removed;
  }

  /** Timers in the order they would run. */
  toSortedArray(): TimerTask[] {
    return [...this.items].sort((a, b) => (less(a, b) ? -1 : less(b, a) ? 1 : 0));
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!less(this.items[index], this.items[parent])) break;
      this.swap(index, parent);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.items.length;
    while (true) {
      const left = index * 2 + 1;
      const right = index * 2 + 2;
      let smallest = index;
      if (left < length && less(this.items[left], this.items[smallest])) smallest = left;
      if (right < length && less(this.items[right], this.items[smallest])) smallest = right;
      if (smallest === index) break;
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i];
    this.items[i] = this.items[j];
    this.items[j] = tmp;
  }
}

function less(a: TimerTask, b: TimerTask): boolean {
  if (a.dueTime !== b.dueTime) return a.dueTime < b.dueTime;
  return a.sequence < b.sequence;
}
