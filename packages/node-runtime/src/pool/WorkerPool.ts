// packages/node-runtime/src/pool/WorkerPool.ts
import { ConfigError } from '../../../core/src/errors/index.js';
import { Channel } from './Channel.js';

export type TaskHandler<T, R> = (task: T, workerId: number) => Promise<R>;

/**
 * Fixed set of worker routines draining one task channel and reporting on a
 * result channel.
 *
 * Handlers are expected to turn task failures into result values; a handler
 * that rejects stops only its own worker and the rejection is rethrown after
 * every other worker has finished.
 */
export class WorkerPool<T, R> {
  constructor(
    readonly size: number,
    private readonly handler: TaskHandler<T, R>,
  ) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ConfigError(`Pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Run every task and resolve once all workers have joined.
   * `onResult` sees results in completion order with the running count.
   */
  async run(
    tasks: Iterable<T>,
    onResult?: (result: R, completed: number) => void,
  ): Promise<R[]> {
    const queue   = new Channel<T>();
    const results = new Channel<R>();
    for (const t of tasks) queue.send(t);
    queue.close();

    const workers = Array.from({ length: this.size }, (_, id) => this.work(id, queue, results));
    const joined  = Promise.allSettled(workers).then(settled => {
      results.close();
      return settled;
    });

    const collected: R[] = [];
    for await (const r of results) {
      collected.push(r);
      onResult?.(r, collected.length);
    }

    const failed = (await joined).find(
      (s): s is PromiseRejectedResult => s.status === 'rejected',
    );
    if (failed) throw failed.reason;
    return collected;
  }

  private async work(id: number, queue: Channel<T>, results: Channel<R>): Promise<void> {
    for await (const task of queue) {
      results.send(await this.handler(task, id));
    }
  }
}
