/**
 * Promise-chain lock.
 *
 * Only needed where a critical section awaits: between await points the
 * event loop already runs one task at a time.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `critical` after every section queued before it has settled.
   */
  async run<T>(critical: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const previous = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await critical();
    } finally {
      release();
    }
  }

  /**
   * Resolves once every section queued so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
