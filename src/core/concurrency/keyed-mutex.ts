/**
 * Keyed Mutex
 *
 * Serializes async work per key while letting different keys run in
 * parallel. Each key holds the tail of a promise chain; a new task waits for
 * the current tail before running. The key is dropped once its last task
 * settles, so idle sessions hold no memory.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 *
 * // These two run one after the other
 * await Promise.all([
 *   mutex.runExclusive('sess_1', () => handleTurn('hello')),
 *   mutex.runExclusive('sess_1', () => handleTurn('again')),
 * ]);
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` once every earlier task for `key` has settled.
   * The task's result or rejection is passed through unchanged.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
