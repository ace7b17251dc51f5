function noop(): void {}

/**
 * Serializes async tasks that share a key. Tasks on different keys run
 * freely; tasks on the same key run one at a time in call order.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // Later callers wait on this; a failed task must not block them
    const tail = current.then(noop, noop);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a task queued or running */
  get activeKeys(): number {
    return this.tails.size;
  }
}
