/**
 * Per-key async mutex.
 *
 * Tasks for the same key run one at a time in arrival order; tasks for
 * different keys never wait on each other. Entries are dropped once a key's
 * queue drains, so memory tracks only keys with work in flight.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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

  /**
   * Number of keys with queued or running work
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
