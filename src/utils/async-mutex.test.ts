import { AsyncMutex } from './async-mutex';

describe('AsyncMutex', () => {
  it('grants the lock immediately when free', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);
    release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('serializes critical sections in FIFO order', async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    let releaseFirst: () => void = () => undefined;
    const first = mutex.withLock(async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
    });
    const second = mutex.withLock(async () => {
      events.push('second');
    });
    const third = mutex.withLock(async () => {
      events.push('third');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second, third]);

    expect(events).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('releases the lock when the critical section throws', async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.withLock(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
  });

  it('ignores a second call to the same release function', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();

    const releaseSecond = await waiting;
    expect(mutex.isLocked()).toBe(true);
    releaseSecond();
    expect(mutex.isLocked()).toBe(false);
  });
});
