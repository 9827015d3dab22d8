/**
 * Serialized execution context for access-control mutations.
 *
 * Tasks run one at a time in submission order. A rejected task settles its
 * own promise and does not stall the tasks queued behind it.
 *
 * @module access/mutationQueue
 */

export class MutationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue `task` behind every previously submitted task.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Tasks submitted but not yet settled. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
