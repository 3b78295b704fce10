import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/core/lock.js';
import { generateId } from '../../src/core/ids.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('KeyedLock', () => {
  it('runs calls for the same key one after another', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('first:start');
        await tick();
        events.push('first:end');
      }),
      lock.run('a', async () => {
        events.push('second:start');
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('lets different keys run together', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await tick();
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b:start');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'a:end']);
  });

  it('releases the key after a failure', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isLocked('a')).toBe(false);
    expect(await lock.run('a', async () => 42)).toBe(42);
  });
});

describe('generateId', () => {
  it('formats prefix, timestamp and suffix', () => {
    const id = generateId('fact', new Date('2030-05-06T07:08:09.010Z'));
    expect(id).toMatch(/^fact_\d{17}_[A-Za-z0-9_-]{8}$/);
  });

  it('sorts by creation order even within one millisecond', () => {
    const now = new Date('2030-01-01T00:00:00.000Z');
    const ids = Array.from({ length: 5 }, () => generateId('x', now));
    expect([...ids].sort()).toEqual(ids);
  });
});
