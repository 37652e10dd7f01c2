/**
 * Runs tasks one at a time in arrival order. Each caller chains onto the
 * previous tail promise, so a rejected task never blocks the ones behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const acquired = new Promise<void>((resolve) => {
      release = resolve;
    });
    const prev = this.tail;
    this.tail = acquired;
    this.pending++;
    await prev;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
