import { describe, it, expect } from 'vitest';
import { KeyedMutex, chunkArray, processConcurrently } from '../src/utils/concurrency';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('processConcurrently', () => {
  it('keeps input order and reports failures separately', async () => {
    const result = await processConcurrently(
      [30, 10, 20, 0],
      async (ms, index) => {
        await new Promise(resolve => setTimeout(resolve, ms));
        if (index === 2) throw new Error('boom');
        return ms * 2;
      },
      { concurrency: 2 }
    );

    expect(result.successful).toEqual([
      { value: 60, index: 0 },
      { value: 20, index: 1 },
      { value: 0, index: 3 },
    ]);
    expect(result.failed.map(f => [f.index, f.error.message])).toEqual([[2, 'boom']]);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await processConcurrently(
      [1, 2, 3, 4, 5],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      },
      { concurrency: 2 }
    );

    expect(peak).toBe(2);
  });
});

describe('chunkArray', () => {
  it('splits into fixed-size batches', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('KeyedMutex', () => {
  it('runs holders of one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map(name =>
        mutex.runExclusive('session', async () => {
          order.push(`${name}:start`);
          await tick();
          order.push(`${name}:end`);
        })
      )
    );

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked('session')).toBe(false);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const releaseA = await mutex.acquire('a');

    const releaseB = await mutex.acquire('b');
    expect(mutex.isLocked('a')).toBe(true);
    expect(mutex.isLocked('b')).toBe(true);

    releaseA();
    releaseB();
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = new KeyedMutex();
    const first = await mutex.acquire('k');
    const second = mutex.acquire('k');

    first();
    first();
    const releaseSecond = await second;
    expect(mutex.isLocked('k')).toBe(true);

    releaseSecond();
    expect(mutex.isLocked('k')).toBe(false);
  });
});
