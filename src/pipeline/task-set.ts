export type TaskResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'fault'; error: unknown };

/**
 * A set of concurrently running async units whose results are collected
 * in completion order, not spawn order.
 *
 * Units start as soon as they are spawned and are never serialized
 * against each other. A unit that throws or rejects is reported as a
 * `fault`; it never rejects `joinNext`.
 */
export class TaskSet<T> {
  private running = 0;
  private readonly completed: TaskResult<T>[] = [];
  private readonly joiners: Array<(result: TaskResult<T>) => void> = [];

  /** Units spawned and not yet handed out by `joinNext`. */
  get size(): number {
    return this.running + this.completed.length;
  }

  spawn(task: () => Promise<T>): void {
    this.running++;

    let promise: Promise<T>;
    try {
      promise = task();
    } catch (error) {
      promise = Promise.reject(error);
    }

    void promise.then(
      (value) => this.settle({ status: 'ok', value }),
      (error: unknown) => this.settle({ status: 'fault', error }),
    );
  }

  /**
   * Resolves with the next unit to finish, or `undefined` when nothing
   * is running or waiting to be collected.
   */
  joinNext(): Promise<TaskResult<T> | undefined> {
    const ready = this.completed.shift();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.running - this.joiners.length <= 0) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.joiners.push(resolve);
    });
  }

  private settle(result: TaskResult<T>): void {
    this.running--;
    const joiner = this.joiners.shift();
    if (joiner) {
      joiner(result);
    } else {
      this.completed.push(result);
    }
  }
}
