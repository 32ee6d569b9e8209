/**
 * Runs tasks one at a time in submission order.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  /** The returned promise settles with the task's own outcome. */
  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
