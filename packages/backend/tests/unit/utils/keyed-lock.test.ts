/**
 * KeyedLock 单元测试
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { LockTimeoutError } from '../../../src/errors';
import { KeyedLock, withTimeout } from '../../../src/utils/keyed-lock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run tasks for the same key one after another', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const first = lock.run('item-1', async () => {
      order.push('first:start');
      await delay(10);
      order.push('first:end');
      return 1;
    });
    const second = lock.run('item-1', async () => {
      order.push('second');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    await delay(0);
    expect(lock.size).toBe(0);
  });

  it('should not block different keys', async () => {
    const lock = new KeyedLock();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = lock.run('item-1', async () => {
      await gate;
      return 'item-1';
    });
    const free = await lock.run('item-2', async () => 'item-2');

    expect(free).toBe('item-2');
    expect(lock.size).toBe(1);

    release();
    expect(await blocked).toBe('item-1');
  });

  it('should release the lock after the task throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('item-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.run('item-1', async () => 'next')).resolves.toBe('next');
  });

  it('should reject the caller on timeout but hold the key until the task settles', async () => {
    vi.useFakeTimers();
    const lock = new KeyedLock(100);
    const order: string[] = [];

    const slow = lock.run('item-1', async () => {
      await delay(500);
      order.push('slow');
      return 'slow';
    });
    const slowAssertion = expect(slow).rejects.toBeInstanceOf(LockTimeoutError);

    await vi.advanceTimersByTimeAsync(100);
    await slowAssertion;
    expect(lock.size).toBe(1);

    let nextSettled = false;
    const next = lock
      .run(
        'item-1',
        async () => {
          order.push('next');
          return 'next';
        },
        1_000,
      )
      .finally(() => {
        nextSettled = true;
      });

    await vi.advanceTimersByTimeAsync(300);
    expect(nextSettled).toBe(false);
    expect(order).toEqual([]);

    await vi.advanceTimersByTimeAsync(100);
    await expect(next).resolves.toBe('next');
    expect(order).toEqual(['slow', 'next']);

    await vi.advanceTimersByTimeAsync(0);
    expect(lock.size).toBe(0);
  });

  it('should skip a queued task whose wait timed out', async () => {
    vi.useFakeTimers();
    const lock = new KeyedLock(1_000);
    const queuedTask = vi.fn(async () => 'queued');

    const first = lock.run('item-1', () => delay(300).then(() => 'first'));
    const queued = lock.run('item-1', queuedTask, 100);
    const queuedAssertion = expect(queued).rejects.toBeInstanceOf(LockTimeoutError);

    await vi.advanceTimersByTimeAsync(100);
    await queuedAssertion;

    await vi.advanceTimersByTimeAsync(200);
    await expect(first).resolves.toBe('first');
    await vi.advanceTimersByTimeAsync(0);

    expect(queuedTask).not.toHaveBeenCalled();
    expect(lock.size).toBe(0);
  });

  it('should clear the timer when the task finishes first', async () => {
    vi.useFakeTimers();

    await expect(withTimeout(Promise.resolve('done'), 100, () => new Error('late'))).resolves.toBe(
      'done',
    );
    expect(vi.getTimerCount()).toBe(0);
  });
});
