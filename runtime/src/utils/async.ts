/**
 * Shared async utilities.
 * @module
 */

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs tasks one at a time in submission order over a promise chain.
 *
 * A rejected task rejects only its own promise; later tasks still run.
 *
 * @example
 * ```typescript
 * const queue = new SerialQueue();
 * const [a, b] = await Promise.all([queue.run(first), queue.run(second)]);
 * // second started after first settled
 * ```
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
