/**
 * Keyed Queue
 *
 * Runs tasks one at a time per key; different keys never wait on each other.
 */

export class KeyedQueue<K = string> {
  private tails = new Map<K, Promise<void>>();

  /**
   * Run `task` after every task previously queued under `key` has settled
   */
  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /**
   * Number of keys with queued or running work
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
