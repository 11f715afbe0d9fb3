/**
 * Fixed-width async worker pool
 * Workers pull the next index from a shared cursor and write into their own result slot,
 * so results line up with the input regardless of completion order
 */

import { EventEmitter } from 'events';

export type PoolTask<T, R> = (item: T, index: number) => Promise<R>;

export type PoolErrorMapper<T, R> = (error: unknown, item: T, index: number) => R;

export interface TaskSettledEvent<R> {
  index: number;
  result: R;
  completed: number;
  total: number;
}

export interface WorkerPoolConfig {
  concurrency: number;
}

export enum WorkerPoolStatus {
  IDLE = 'idle',
  RUNNING = 'running',
}

export class WorkerPool<T, R> extends EventEmitter {
  private readonly concurrency: number;
  private status = WorkerPoolStatus.IDLE;

  constructor(config: WorkerPoolConfig) {
    super();

    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new Error(`Worker pool concurrency must be a positive integer, got ${config.concurrency}`);
    }
    this.concurrency = config.concurrency;
  }

  public getStatus(): WorkerPoolStatus {
    return this.status;
  }

  /**
   * Run every item exactly once. A rejected task is turned into a result by mapError,
   * so the returned array always has one entry per item. If a taskSettled listener or
   * mapError throws, the run rejects with that error after the other workers drain.
   */
  public async run(
    items: readonly T[],
    task: PoolTask<T, R>,
    mapError: PoolErrorMapper<T, R>
  ): Promise<R[]> {
    if (this.status !== WorkerPoolStatus.IDLE) {
      throw new Error(`Cannot start worker pool from status: ${this.status}`);
    }
    this.status = WorkerPoolStatus.RUNNING;

    const results = new Array<R>(items.length);
    let nextIndex = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        const item = items[index];

        let result: R;
        try {
          result = await task(item, index);
        } catch (error) {
          result = mapError(error, item, index);
        }

        results[index] = result;
        completed += 1;

        const event: TaskSettledEvent<R> = { index, result, completed, total: items.length };
        this.emit('taskSettled', event);
      }
    };

    const width = Math.min(this.concurrency, items.length);

    // A throwing listener or mapper stops only its own worker; the run settles once all of them have returned
    const settled = await Promise.allSettled(Array.from({ length: width }, () => worker()));
    this.status = WorkerPoolStatus.IDLE;

    const crashed = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (crashed) {
      throw crashed.reason;
    }

    return results;
  }
}
