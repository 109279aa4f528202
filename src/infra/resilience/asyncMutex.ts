/**
 * Serializes async critical sections in FIFO order.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue keeps moving after a failed task; the caller still receives the rejection via `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
