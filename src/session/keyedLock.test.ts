import { beforeEach, describe, expect, it } from 'vitest';
import { KeyedLock } from './keyedLock';

describe('KeyedLock', () => {
  let lock: KeyedLock;

  beforeEach(() => {
    lock = new KeyedLock();
  });

  it('should acquire and release a lock', async () => {
    const release = await lock.acquire('s1');
    expect(lock.isLocked('s1')).toBe(true);

    release();
    expect(lock.isLocked('s1')).toBe(false);
  });

  it('should allow different keys concurrently', async () => {
    const r1 = await lock.acquire('s1');
    const r2 = await lock.acquire('s2');

    expect(lock.isLocked('s1')).toBe(true);
    expect(lock.isLocked('s2')).toBe(true);

    r1();
    r2();
  });

  it('should serialize access to the same key', async () => {
    const order: number[] = [];

    const r1 = await lock.acquire('s1');
    order.push(1);

    const p2 = lock.acquire('s1').then((release) => {
      order.push(2);
      release();
    });

    await new Promise((r) => setTimeout(r, 10));
    expect(order).toEqual([1]);

    r1();
    await p2;

    expect(order).toEqual([1, 2]);
  });

  it('should hand the lock to one waiter at a time', async () => {
    const active: string[] = [];
    let maxActive = 0;

    const task = (name: string) =>
      lock.runExclusive('s1', async () => {
        active.push(name);
        maxActive = Math.max(maxActive, active.length);
        await new Promise((r) => setTimeout(r, 5));
        active.splice(active.indexOf(name), 1);
        return name;
      });

    const results = await Promise.all([task('a'), task('b'), task('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(maxActive).toBe(1);
    expect(lock.isLocked('s1')).toBe(false);
  });

  it('should release the lock when the task throws', async () => {
    await expect(
      lock.runExclusive('s1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isLocked('s1')).toBe(false);
  });
});
