/**
 * Serializes async critical sections per key. Tasks sharing a key run one
 * after another in call order; tasks on different keys never wait on each
 * other.
 */
export class KeyedLock<K = string> {
  private tails = new Map<K, Promise<void>>();
  private pending = new Map<K, number>();

  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1);

    await previous;
    try {
      return await task();
    } finally {
      release();
      const left = (this.pending.get(key) ?? 1) - 1;
      if (left > 0) {
        this.pending.set(key, left);
      } else {
        this.pending.delete(key);
      }
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while a task for `key` is running or queued. */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  /** True when tasks for `key` are queued behind the one running. */
  hasWaiters(key: K): boolean {
    return (this.pending.get(key) ?? 0) > 1;
  }
}
