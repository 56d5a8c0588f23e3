const noop = (): void => {};

/**
 * Per-key task queue. Tasks sharing a key run one after another in arrival
 * order; tasks under different keys run concurrently. A failed task does not
 * block the ones queued behind it.
 */
export class KeyedSerializer {
  private readonly queues = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const start = () => task();
    const result = previous.then(start, start);
    const settled: Promise<void> = result.then(noop, noop).then(() => {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    });
    this.queues.set(key, settled);
    return result;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.queues.size;
  }
}
