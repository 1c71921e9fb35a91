import { describe, expect, it } from 'vitest';
import { Semaphore } from '../concurrency';

describe('Semaphore', () => {
  it('hands slots to waiters in order as they are released', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const release = await semaphore.acquire();
    const second = semaphore.acquire().then((next) => {
      order.push('second');
      return next;
    });
    const third = semaphore.acquire().then((next) => {
      order.push('third');
      return next;
    });

    expect(semaphore.inUse).toBe(1);
    release();
    (await second)();
    (await third)();

    expect(order).toEqual(['second', 'third']);
    expect(semaphore.inUse).toBe(0);
  });

  it('ignores a second release of the same slot', async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();
    await semaphore.acquire();
    release();
    release();
    expect(semaphore.inUse).toBe(1);
  });

  it('rejects a waiter whose signal aborts and drops it from the queue', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();
    const waiting = semaphore.acquire(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toThrow('Aborted');
    release();
    expect(semaphore.inUse).toBe(0);
  });

  it('returns the slot when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.use(async () => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');
    expect(semaphore.inUse).toBe(0);
  });
});
