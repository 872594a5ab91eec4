// In-process admission locks
// Serializes check-then-insert sequences that share a key.

/**
 * Keyed mutual exclusion. Tasks on one key run strictly one after another,
 * in the order `runExclusive` was called; tasks on different keys do not
 * wait on each other.
 *
 * Contention never fails: a caller waits for the key instead of being refused.
 * A task that throws releases the key, and only its own caller sees the error.
 */
export class AdmissionLocks {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(lockKey: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(lockKey) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(lockKey, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(lockKey) === tail) {
        this.tails.delete(lockKey);
      }
    }
  }

  /**
   * True while a task holds or waits for the key.
   */
  isHeld(lockKey: string): boolean {
    return this.tails.has(lockKey);
  }
}
