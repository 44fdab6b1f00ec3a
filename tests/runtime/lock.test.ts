import { describe, it, expect } from 'vitest';
import { TokenLock } from '../../src/runtime/lock';
import { deferred } from '../helpers/updates';

describe('token lock (LOCK)', () => {
  it('should grant the lock in arrival order', async () => {
    const lock = new TokenLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('t', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('t', () => {
      order.push('second');
    });
    const third = lock.run('t', () => {
      order.push('third');
    });

    await Promise.resolve();
    expect(lock.queued('t')).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(lock.isLocked('t')).toBe(false);
    expect(lock.queued('t')).toBe(0);
  });

  it('should not make different tokens wait on each other', async () => {
    const lock = new TokenLock();
    const gate = deferred();
    const held = lock.run('a', () => gate.promise);

    let ran = false;
    await lock.run('b', () => {
      ran = true;
    });
    expect(ran).toBe(true);
    expect(lock.isLocked('a')).toBe(true);

    gate.resolve();
    await held;
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new TokenLock();
    await expect(
      lock.run('t', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(lock.isLocked('t')).toBe(false);
  });

  it('should reject a second release', async () => {
    const lock = new TokenLock();
    const release = await lock.acquire('t');
    release();
    expect(() => release()).toThrow(
      "[Tether Invariant] Lock for token 't' released twice"
    );
  });
});
