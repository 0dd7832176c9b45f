// packages/node-runtime/src/pool/Channel.ts

/**
 * Unbounded FIFO channel. Any number of producers `send`, any number of
 * consumers iterate; each value is delivered to exactly one consumer.
 * Iteration ends once the channel is closed and drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly waiting: Array<(r: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean { return this.closed; }
  get size(): number      { return this.queue.length; }

  /**
   * @throws {Error} when the channel is already closed
   */
  send(value: T): void {
    if (this.closed) throw new Error('send on closed channel');
    const next = this.waiting.shift();
    if (next) next({ value, done: false });
    else this.queue.push(value);
  }

  /** Queued values stay receivable; idle receivers are told the stream ended. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    // receivers only wait while the queue is empty
    for (const w of this.waiting.splice(0)) w({ value: undefined, done: true });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => this.waiting.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}
