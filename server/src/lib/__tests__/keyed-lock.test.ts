import { KeyedLock } from '../keyed-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run work for the same key one at a time', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('sender', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive('sender', async () => {
      order.push('second:start');
    });

    await Promise.resolve();
    expect(lock.isLocked('sender')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not make unrelated keys wait', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.runExclusive('a@example.com', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.runExclusive('b@example.com', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await slow;
    expect(order).toEqual(['b', 'a']);
  });

  it('should release the key when the work throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.runExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.runExclusive('k', async () => 'next')).resolves.toBe('next');
    expect(lock.activeKeys).toBe(0);
  });
});
