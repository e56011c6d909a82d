import { describe, it, expect } from 'vitest';
import { Semaphore, mapSettled } from '../Semaphore.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

describe('Semaphore', () => {
  it('rejects a capacity below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('queues acquirers beyond capacity and releases them in order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.pending).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.pending).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await semaphore.run(async () => 'next')).toBe('next');
  });
});

describe('mapSettled', () => {
  it('bounds the number of running workers', async () => {
    let running = 0;
    let peak = 0;

    await mapSettled([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await tick();
      running--;
    });

    expect(peak).toBe(3);
  });

  it('settles every item, in input order, even when some fail', async () => {
    const results = await mapSettled(['a', 'b', 'c'], 2, async (item, index) => {
      if (item === 'b') throw new Error(`bad ${index}`);
      return item.toUpperCase();
    });

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    const second = results[1];
    expect(second.status === 'rejected' ? second.reason : undefined).toEqual(new Error('bad 1'));
  });

  it('handles an empty batch and a fractional width', async () => {
    expect(await mapSettled([], 10, async () => 1)).toEqual([]);
    const results = await mapSettled([1, 2], 1.7, async (n) => n * 2);
    expect(results).toEqual([
      { status: 'fulfilled', value: 2 },
      { status: 'fulfilled', value: 4 },
    ]);
  });
});
