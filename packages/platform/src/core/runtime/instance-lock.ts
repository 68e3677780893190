/**
 * Keyed Mutex
 *
 * Serializes async work per key. Each key has a promise chain; work for
 * one key waits for the previous work on that key, while different keys
 * run independently. Chains are dropped once they drain.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with work queued or running */
  get activeKeys(): number {
    return this.tails.size;
  }
}
