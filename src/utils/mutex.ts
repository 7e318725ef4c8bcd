export type MutexTask<T> = () => Promise<T> | T;

/**
 * Promise-chain lock: tasks run one at a time, in the order `run` was called.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: MutexTask<T>): Promise<T> {
    const result = this.tail.then(() => task());
    // Keep the chain alive whatever the task outcome; callers observe `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * One lock per key. Keys with no queued work are dropped.
 */
export class KeyedMutex {
  private readonly chains = new Map<string, Promise<unknown>>();

  async run<T>(key: string, task: MutexTask<T>): Promise<T> {
    const prev = this.chains.get(key) || Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chain = prev.then(() => done);
    this.chains.set(key, chain);

    try {
      await prev;
      return await task();
    } finally {
      release();
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }
}
