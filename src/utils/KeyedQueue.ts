/**
 * Runs tasks one at a time per key, in the order they were queued.
 * Tasks under different keys run concurrently.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  get pending(): number {
    return this.tails.size;
  }

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // the chain continues whether or not this task fails
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }
}
