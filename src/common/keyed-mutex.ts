/**
 * Serializes async work per key. Work queued under different keys runs concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      // last one out cleans up
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string) {
    return this.tails.has(key);
  }
}
