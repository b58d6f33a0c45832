/**
 * Runs async tasks one at a time, in submission order.
 *
 * A rejected task does not stall the queue; its error is delivered to the
 * caller that submitted it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
