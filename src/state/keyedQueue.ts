/**
 * Runs operations one at a time per key. Used to serialize the updates of a
 * single user so that handlers never interleave at their network calls.
 */
export class KeyedQueue<K = number> {
  private readonly chains = new Map<K, Promise<void>>();

  async run<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => next);
    this.chains.set(key, tail);
    await previous;

    try {
      return await operation();
    } finally {
      release();
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }

  activeKeys(): number {
    return this.chains.size;
  }
}
