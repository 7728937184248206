/**
 * Per-key async mutex. Tasks sharing a key run one after another in
 * arrival order; different keys do not wait on each other.
 */
export interface KeyedLock {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Keys with a running or queued task */
  readonly size: number;
}

export const createKeyedLock = (normalise: (key: string) => string = (k) => k): KeyedLock => {
  const tails = new Map<string, Promise<void>>();

  return {
    async run<T>(rawKey: string, task: () => Promise<T>): Promise<T> {
      const key = normalise(rawKey);
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) tails.delete(key);
      }
    },

    get size() {
      return tails.size;
    },
  };
};
