/**
 * Keyed Lock - serializes async read-modify-write sequences on shared state
 *
 * Each key owns a promise chain; callers queue behind the previous holder.
 * Used for:
 * - the process-wide rotation (played set) shared by every learner session
 * - read-modify-write of the admin settings record
 */

import { LockTimeoutError } from "./errors";
import { log, logError } from "./logger";

interface LockState {
  queue: Promise<void>;
  count: number;
}

export class KeyedLock {
  private readonly locks = new Map<string, LockState>();

  constructor(private readonly timeoutMs = 5000) {}

  /**
   * Run `fn` with exclusive access to `key`.
   *
   * @throws LockTimeoutError when the previous holder does not release in time
   *
   * @example
   * ```typescript
   * await lock.run("rotation", "markPlayed", async () => {
   *   const played = await store.load();
   *   await store.save([...played, id]);
   * });
   * ```
   */
  async run<T>(key: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const lockStart = Date.now();
    let acquired = false;

    const state = this.locks.get(key) ?? { queue: Promise.resolve(), count: 0 };
    const previous = state.queue;
    state.count++;
    this.locks.set(key, state);

    let release: () => void = () => {};
    const ours = new Promise<void>((resolve) => {
      release = resolve;
    });
    state.queue = previous.then(() => ours);

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        previous,
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new LockTimeoutError(key, operation)), this.timeoutMs);
        }),
      ]);
      clearTimeout(timer);
      acquired = true;

      const waited = Date.now() - lockStart;
      if (waited > 100) {
        log(`[keyedLock] ${operation} waited ${waited}ms for ${key}`);
      }
      return await fn();
    } catch (err) {
      clearTimeout(timer);
      if (!acquired) {
        logError(`[keyedLock] Lock timeout for ${key}:`, operation);
      }
      throw err;
    } finally {
      release();
      const current = this.locks.get(key);
      if (current) {
        current.count--;
        if (current.count <= 0) this.locks.delete(key);
      }
    }
  }

  isHeld(key: string): boolean {
    return this.locks.has(key);
  }

  /** Number of keys with a holder or waiters. */
  size(): number {
    return this.locks.size;
  }

  /** Drop all bookkeeping. Only for tests and shutdown. */
  clear(): void {
    this.locks.clear();
  }
}
