/**
 * taskQueue.ts — FIFO backlog of discovered tasks, consumed by N harvesters.
 *
 *   push()  appends (rejected after close()).
 *   pop()   resolves with the oldest task, waits while the queue is empty but
 *           still open, and resolves with `QUEUE_DRAINED` once it is closed
 *           and empty.
 *
 * Each task is handed to exactly one consumer: a task goes either to the
 * oldest waiting consumer or into the backlog, never both.
 */

import type { DiscoveryTask } from '../core/types';

/** Sentinel returned by pop() once the queue is closed and empty. */
export const QUEUE_DRAINED: unique symbol = Symbol('queue-drained');
export type QueueDrained = typeof QUEUE_DRAINED;

export interface QueueCounts {
  pushed: number;
  popped: number;
  pending: number;
  waiting: number;
  closed: boolean;
}

export class TaskQueue<T = DiscoveryTask> {
  private readonly backlog: T[] = [];
  private readonly consumers: ((item: T | QueueDrained) => void)[] = [];
  private closed = false;
  private pushed = 0;
  private popped = 0;

  push(item: T): void {
    if (this.closed) {
      throw new Error('TaskQueue is closed');
    }
    this.pushed += 1;

    const consumer = this.consumers.shift();
    if (consumer) {
      this.popped += 1;
      consumer(item);
    } else {
      this.backlog.push(item);
    }
  }

  pushAll(items: Iterable<T>): void {
    for (const item of items) this.push(item);
  }

  pop(): Promise<T | QueueDrained> {
    if (this.backlog.length > 0) {
      const [item] = this.backlog.splice(0, 1);
      this.popped += 1;
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(QUEUE_DRAINED);
    }
    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /** No more pushes.  Consumers blocked on an empty queue receive QUEUE_DRAINED. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const consumer of this.consumers.splice(0)) {
      consumer(QUEUE_DRAINED);
    }
  }

  /** Close and hand back everything nobody popped (used on cancellation). */
  drainRemaining(): T[] {
    this.close();
    return this.backlog.splice(0);
  }

  get size(): number {
    return this.backlog.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  counts(): QueueCounts {
    return {
      pushed: this.pushed,
      popped: this.popped,
      pending: this.backlog.length,
      waiting: this.consumers.length,
      closed: this.closed,
    };
  }
}
