/**
 * Per-key mutual exclusion. Tasks sharing a key run one at a time in call
 * order; tasks under different keys never wait on each other.
 */
export class KeyedMutex {
  // Tail of the chain for each key; removed once the last holder releases
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tails.get(key) ?? Promise.resolve();
    const tail = previous.then(() => gate);
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

  // Number of keys with a running or queued task
  get activeKeys(): number {
    return this.tails.size;
  }
}
