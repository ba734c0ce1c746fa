/**
 * Serial Lock - Runs critical sections one at a time, in arrival order
 *
 * Each caller chains onto the tail of the previous one. A failing section
 * releases the lock like a successful one.
 */

export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Number of sections queued or running */
  get pending(): number {
    return this.waiting;
  }

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.waiting++;

    try {
      await previous;
      return await section();
    } finally {
      this.waiting--;
      release();
    }
  }
}
