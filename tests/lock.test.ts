import { KeyedMutex } from '../src/core/lock';

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('runs callers of one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const slow = mutex.withLock('600000', async () => {
      await tick();
      await tick();
      order.push('first');
    });
    const fast = mutex.withLock('600000', async () => {
      order.push('second');
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual(['first', 'second']);
    expect(mutex.isLocked('600000')).toBe(false);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const a = mutex.withLock('600000', async () => {
      await tick();
      await tick();
      order.push('600000');
    });
    const b = mutex.withLock('510300', async () => {
      order.push('510300');
    });
    await Promise.all([a, b]);
    expect(order).toEqual(['510300', '600000']);
  });

  it('releases the key when the holder throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.withLock('600000', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.withLock('600000', () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('600000')).toBe(false);
  });
});
