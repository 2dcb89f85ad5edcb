/**
 * Runs tasks one at a time, in call order. A task that rejects does not
 * block the ones queued behind it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task).finally(() => {
      this.queued--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Tasks waiting or running. */
  get pending(): number {
    return this.queued;
  }
}
