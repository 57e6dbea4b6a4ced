import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../queue.js';

async function settled<T>(promise: Promise<T>): Promise<boolean> {
  let done = false;
  void promise.then(() => {
    done = true;
  });
  await new Promise(resolve => setImmediate(resolve));
  return done;
}

describe('BoundedQueue', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
  });

  it('should hand items out in order', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.put(1);
    await queue.put(2);

    expect(await queue.take()).toEqual({ closed: false, item: 1 });
    expect(await queue.take()).toEqual({ closed: false, item: 2 });
    expect(queue.length).toBe(0);
    expect(queue.maxLength).toBe(2);
  });

  it('should block a put while full', async () => {
    const queue = new BoundedQueue<string>(1);
    expect(await queue.put('a')).toBe(true);

    const blocked = queue.put('b');
    expect(await settled(blocked)).toBe(false);

    expect(await queue.take()).toEqual({ closed: false, item: 'a' });
    expect(await blocked).toBe(true);
    expect(queue.length).toBe(1);
    expect(queue.maxLength).toBe(1);
  });

  it('should pass an item straight to a waiting taker', async () => {
    const queue = new BoundedQueue<string>(1);
    const waiting = queue.take();

    expect(await queue.put('x')).toBe(true);
    expect(await waiting).toEqual({ closed: false, item: 'x' });
    expect(queue.maxLength).toBe(0);
  });

  it('should release waiters on close', async () => {
    const full = new BoundedQueue<string>(1);
    await full.put('a');
    const blocked = full.put('b');
    full.close();
    expect(await blocked).toBe(false);
    expect(await full.put('c')).toBe(false);

    // remaining items are still delivered
    expect(await full.take()).toEqual({ closed: false, item: 'a' });
    expect(await full.take()).toEqual({ closed: true });

    const empty = new BoundedQueue<string>(1);
    const waiting = empty.take();
    empty.close();
    expect(await waiting).toEqual({ closed: true });
    expect(empty.isClosed).toBe(true);
  });

  it('should drain queued items and refuse blocked puts', async () => {
    const queue = new BoundedQueue<number>(2);
    await queue.put(1);
    await queue.put(2);
    const blocked = queue.put(3);

    expect(queue.drain()).toEqual([1, 2]);
    expect(await blocked).toBe(false);
    expect(queue.length).toBe(0);
  });
});
