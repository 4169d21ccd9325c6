/**
 * Per-key mutual exclusion for async work within one process
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every task queued earlier under the same key has settled
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
