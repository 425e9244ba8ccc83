/**
 * Promise-chain mutex. Tasks passed to runExclusive run one at a time,
 * in the order they were submitted.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this._pending++;

    try {
      await previous;
      return await task();
    } finally {
      this._pending--;
      release();
    }
  }

  /** Number of tasks running or waiting. */
  get pending(): number {
    return this._pending;
  }
}
