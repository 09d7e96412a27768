/**
 * @causal-log/event-store — Promise-chain lock.
 *
 * Runs async tasks one at a time in arrival order. Each task waits for
 * the previous one to settle (fulfilled or rejected) before starting.
 */
export class SerialLock {
  private _tail: Promise<void> = Promise.resolve();

  /**
   * Acquire the lock and execute `fn` exclusively.
   * The lock is released whether `fn` resolves or throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this._tail;

    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this._tail = next;

    await previous;

    try {
      return await fn();
    } finally {
      release();
    }
  }
}
