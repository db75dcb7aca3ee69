/**
 * FIFO mutual exclusion for async sections.
 *
 * Not re-entrant: a section that awaits `run` on the same lock deadlocks.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
