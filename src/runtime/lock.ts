/**
 * Per-token FIFO mutex.
 *
 * One holder per client token at a time; waiters are granted the lock in
 * arrival order. Different tokens never wait on each other.
 *
 * @example
 * ```ts
 * const lock = new TokenLock();
 * await lock.run(token, async () => {
 *   // exclusive access to this client's state
 * });
 * ```
 */

import { invariant } from '../dev/invariant';

export class TokenLock {
  private readonly waiters = new Map<string, Array<() => void>>();
  private readonly held = new Set<string>();

  isLocked(token: string): boolean {
    return this.held.has(token);
  }

  /** Number of callers waiting for `token` (the holder excluded). */
  queued(token: string): number {
    return this.waiters.get(token)?.length ?? 0;
  }

  /**
   * Wait for the lock. Resolves with a release function that must be called
   * exactly once.
   */
  async acquire(token: string): Promise<() => void> {
    if (this.held.has(token)) {
      await new Promise<void>((resolve) => {
        const queue = this.waiters.get(token) ?? [];
        queue.push(resolve);
        this.waiters.set(token, queue);
      });
    } else {
      this.held.add(token);
    }

    let released = false;
    return () => {
      invariant(!released, `Lock for token '${token}' released twice`);
      released = true;
      this.release(token);
    };
  }

  async run<T>(token: string, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(token);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(token: string): void {
    const queue = this.waiters.get(token);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.waiters.delete(token);
    if (next) {
      // Ownership passes directly to the next waiter; `held` stays set.
      next();
    } else {
      this.held.delete(token);
    }
  }
}
