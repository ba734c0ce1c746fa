import { describe, it, expect } from 'vitest';
import { AsyncQueue } from './async-queue.js';

describe('AsyncQueue', () => {
  it('should deliver items pushed before and after a consumer waits', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);

    const received: number[] = [];
    const consumer = (async () => {
      for await (const item of queue) {
        received.push(item);
      }
    })();

    queue.push(2);
    queue.push(3);
    queue.close();
    await consumer;

    expect(received).toEqual([1, 2, 3]);
  });

  it('should refuse pushes once closed', async () => {
    const queue = new AsyncQueue<string>();
    queue.close();

    expect(queue.push('late')).toBe(false);
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
