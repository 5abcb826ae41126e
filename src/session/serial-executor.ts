/**
 * Runs async tasks one at a time, in submission order.
 *
 * Used as the session's critical section: promote, flush, immediate sends
 * and close never interleave. A task must not submit to the same executor
 * and await the result, or it waits on itself.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get busy(): boolean {
    return this.pending > 0;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  private release(): void {
    this.pending--;
  }
}
