import { expect, test } from '@playwright/test';
import { createTask } from '../src/core/types';
import { QUEUE_DRAINED, TaskQueue } from '../src/pipeline/taskQueue';

const task = (n: number) =>
  createTask(`t-${n}`, { kind: 'url', url: `https://uni.example/p/${n}` }, 'https://uni.example/list');

test.describe('TaskQueue', () => {
  test('pops in FIFO order', async () => {
    const queue = new TaskQueue();
    queue.pushAll([task(1), task(2), task(3)]);

    expect((await queue.pop()) === QUEUE_DRAINED).toBe(false);
    const second = await queue.pop();
    expect(second !== QUEUE_DRAINED && second.id).toBe('t-2');
    expect(queue.size).toBe(1);
  });

  test('a blocked consumer receives the next push', async () => {
    const queue = new TaskQueue<string>();
    const waiting = queue.pop();
    queue.push('a');

    expect(await waiting).toBe('a');
    expect(queue.counts()).toEqual({ pushed: 1, popped: 1, pending: 0, waiting: 0, closed: false });
  });

  test('each item goes to exactly one of several waiting consumers', async () => {
    const queue = new TaskQueue<number>();
    const consumers = [queue.pop(), queue.pop(), queue.pop()];
    queue.pushAll([1, 2]);
    queue.close();

    expect(await Promise.all(consumers)).toEqual([1, 2, QUEUE_DRAINED]);
  });

  test('close() hands the backlog out before signalling drained', async () => {
    const queue = new TaskQueue<number>();
    queue.pushAll([1, 2]);
    queue.close();

    expect(await queue.pop()).toBe(1);
    expect(await queue.pop()).toBe(2);
    expect(await queue.pop()).toBe(QUEUE_DRAINED);
    expect(await queue.pop()).toBe(QUEUE_DRAINED);
  });

  test('rejects pushes after close', () => {
    const queue = new TaskQueue<number>();
    queue.close();
    expect(() => queue.push(1)).toThrow('TaskQueue is closed');
    expect(queue.isClosed).toBe(true);
  });

  test('drainRemaining() closes and returns what nobody popped', async () => {
    const queue = new TaskQueue<number>();
    queue.pushAll([1, 2, 3]);
    await queue.pop();

    expect(queue.drainRemaining()).toEqual([2, 3]);
    expect(queue.size).toBe(0);
    expect(await queue.pop()).toBe(QUEUE_DRAINED);
  });
});
