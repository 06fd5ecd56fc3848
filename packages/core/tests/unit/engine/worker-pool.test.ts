import { describe, expect, it } from 'vitest';
import { AsyncSemaphore, runPool } from '../../../src/engine/worker-pool.js';
import { sleep } from '../../../src/utils/sleep.js';

describe('AsyncSemaphore', () => {
  it('rejects sizes below one', () => {
    expect(() => new AsyncSemaphore(0)).toThrow(RangeError);
    expect(() => new AsyncSemaphore(1.5)).toThrow('Semaphore size must be a positive integer, got 1.5');
  });

  it('hands the slot to the next waiter on release', async () => {
    const semaphore = new AsyncSemaphore(1);
    await semaphore.acquire();
    let acquired = false;
    const waiting = semaphore.acquire().then(() => {
      acquired = true;
    });
    await sleep(5);
    expect(acquired).toBe(false);
    semaphore.release();
    await waiting;
    expect(acquired).toBe(true);
    expect(semaphore.inFlight).toBe(1);
  });
});

describe('runPool', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
    });
    expect(peak).toBe(2);
  });

  it('returns outcomes in input order', async () => {
    const outcomes = await runPool([30, 5, 15], 3, async (ms, index) => {
      await sleep(ms);
      return `item-${index}`;
    });
    expect(outcomes).toEqual([
      { status: 'done', value: 'item-0' },
      { status: 'done', value: 'item-1' },
      { status: 'done', value: 'item-2' },
    ]);
  });

  it('skips items whose turn comes after shouldStart turns false', async () => {
    let open = true;
    const started: string[] = [];
    const outcomes = await runPool(
      ['a', 'b', 'c'],
      1,
      async (item) => {
        started.push(item);
        open = false;
        return item;
      },
      { shouldStart: () => open },
    );
    expect(started).toEqual(['a']);
    expect(outcomes).toEqual([{ status: 'done', value: 'a' }, { status: 'skipped' }, { status: 'skipped' }]);
  });

  it('propagates a worker error', async () => {
    await expect(
      runPool([1], 1, async () => {
        throw new Error('worker broke');
      }),
    ).rejects.toThrow('worker broke');
  });
});
