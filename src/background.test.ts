import { describe, expect, test } from 'vitest';
import { BackgroundQueue } from './background';
import { silentLogger } from './logger';

describe('BackgroundQueue', () => {
  test('does not run tasks before the scheduler returns', async () => {
    const queue = new BackgroundQueue({ logger: silentLogger });
    const order: string[] = [];

    queue.schedule('task', async () => {
      order.push('task');
    });
    order.push('returned');
    await Promise.resolve();

    expect(order).toEqual(['returned']);
    expect(queue.size).toBe(1);

    await queue.drain();
    expect(order).toEqual(['returned', 'task']);
    expect(queue.size).toBe(0);
  });

  test('a failing task does not affect the others', async () => {
    const queue = new BackgroundQueue({ logger: silentLogger });
    const done: string[] = [];

    queue.schedule('broken', async () => {
      throw new Error('boom');
    });
    queue.schedule('fine', async () => {
      done.push('fine');
    });

    await queue.drain();
    expect(done).toEqual(['fine']);
  });

  test('drain waits for tasks scheduled by other tasks', async () => {
    const queue = new BackgroundQueue({ logger: silentLogger });
    const done: string[] = [];

    queue.schedule('outer', async () => {
      done.push('outer');
      queue.schedule('inner', async () => {
        done.push('inner');
      });
    });

    await queue.drain();
    expect(done).toEqual(['outer', 'inner']);
  });

  test('drain on an empty queue resolves', async () => {
    await expect(new BackgroundQueue({ logger: silentLogger }).drain()).resolves.toBeUndefined();
  });
});
