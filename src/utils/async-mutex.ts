/**
 * Serializes async critical sections. Each caller chains onto the previous
 * holder's promise, so sections run one at a time in arrival order.
 *
 * ```ts
 * const mutex = new AsyncMutex();
 * await mutex.runExclusive(async () => {
 *   // only one caller at a time
 * });
 * ```
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });

    // Claim the tail before awaiting, otherwise two callers could both
    // wait on the same predecessor and then run together.
    this.tail = current;
    this.pending++;

    try {
      await previous;
      return await operation();
    } finally {
      this.pending--;
      release();
    }
  }
}
