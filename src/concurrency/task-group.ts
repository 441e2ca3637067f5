/**
 * Bounded concurrent execution.
 *
 * A {@link TaskGroup} runs spawned tasks with at most `width` in flight and
 * does not let its owner continue until every task has settled.
 *
 * @module concurrency/task-group
 */

import { InvalidArgumentError } from '../errors/index.js';

/**
 * Counting semaphore.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new InvalidArgumentError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Release a permit, potentially unblocking a waiting caller
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.permits++;
  }

  /**
   * Runs `task` while holding a permit.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Settled result of one task.
 */
export type TaskResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Structured group of concurrent tasks.
 */
export class TaskGroup<T> {
  private readonly semaphore: Semaphore;
  private readonly tasks: Array<Promise<TaskResult<T>>> = [];
  private joined = false;

  /**
   * @param width - Maximum number of tasks running at once
   */
  constructor(width: number) {
    this.semaphore = new Semaphore(width);
  }

  /**
   * Schedules a task. It starts as soon as a slot is free.
   */
  spawn(task: () => Promise<T>): void {
    if (this.joined) {
      throw new InvalidArgumentError('Cannot spawn into a task group that was already joined');
    }
    this.tasks.push(
      this.semaphore.run(task).then(
        (value): TaskResult<T> => ({ ok: true, value }),
        (error: unknown): TaskResult<T> => ({ ok: false, error })
      )
    );
  }

  /**
   * Waits for every task and returns the results in spawn order.
   */
  async settle(): Promise<Array<TaskResult<T>>> {
    this.joined = true;
    return Promise.all(this.tasks);
  }

  /**
   * Waits for every task. If any failed, rethrows the first failure in spawn
   * order once all tasks have settled.
   */
  async join(): Promise<T[]> {
    const results = await this.settle();
    const values: T[] = [];
    for (const result of results) {
      if (!result.ok) {
        throw result.error;
      }
      values.push(result.value);
    }
    return values;
  }
}

/**
 * Maps items through `task` with at most `width` running at once. Results
 * keep input order.
 */
export async function mapBounded<I, O>(
  items: readonly I[],
  width: number,
  task: (item: I, index: number) => Promise<O>
): Promise<O[]> {
  const group = new TaskGroup<O>(width);
  items.forEach((item, index) => group.spawn(() => task(item, index)));
  return group.join();
}
