/**
 * Runs async tasks one at a time, in submission order.
 *
 * A task's failure is delivered to its own caller only; the queue moves
 * on to the next task either way.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Tasks submitted and not yet settled, including the running one. */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
