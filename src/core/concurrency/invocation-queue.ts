/**
 * Runs tasks one at a time in submission order, so every bot invocation sees
 * the committed state of the one before it and never interleaves with it.
 */
export class InvocationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(async () => task());
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
