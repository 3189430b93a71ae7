/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not block the ones queued after it
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
