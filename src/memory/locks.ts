/**
 * Advisory per-key locks (FIFO). Keys look like `memory:12`, `session:3`,
 * `conversation:abc`.
 *
 * `run` queues behind the current holder. `tryRun`/`tryRunAll` never wait:
 * background work uses them to skip busy records and retry on a later pass.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  // Registers the caller in the queue synchronously.
  private enqueue(key: string): { ready: Promise<void>; release: () => void } {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let signal: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      signal = resolve;
    });
    const tail = prev.then(() => current);
    this.tails.set(key, tail);

    return {
      ready: prev,
      release: () => {
        signal();
        if (this.tails.get(key) === tail) this.tails.delete(key);
      },
    };
  }

  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const { ready, release } = this.enqueue(key);
    await ready;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async tryRun<T>(
    key: string,
    fn: () => T | Promise<T>,
  ): Promise<{ acquired: true; value: T } | { acquired: false }> {
    return this.tryRunAll([key], fn);
  }

  async tryRunAll<T>(
    keys: string[],
    fn: () => T | Promise<T>,
  ): Promise<{ acquired: true; value: T } | { acquired: false }> {
    const unique = [...new Set(keys)];
    if (unique.some((k) => this.isLocked(k))) return { acquired: false };

    const held = unique.map((k) => this.enqueue(k));
    try {
      return { acquired: true, value: await fn() };
    } finally {
      for (const h of held) h.release();
    }
  }
}

export const memoryLocks = new KeyedLock();

export const memoryKey = (id: number): string => `memory:${id}`;
export const sessionKey = (id: number): string => `session:${id}`;
export const conversationKey = (id: string): string => `conversation:${id}`;
