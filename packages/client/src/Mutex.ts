/**
 * Serializes async tasks: each task starts only after every previously
 * queued task has settled. Not re-entrant: a task that queues another task
 * on the same mutex and awaits it never completes.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Whether a task is running or queued */
  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
