/**
 * Unbounded, closable queue consumed with `for await`.
 *
 * Senders never block and nothing is dropped: items published while no
 * consumer is waiting are buffered. Iteration ends once the channel has been
 * closed and the buffer is empty.
 */
export class OutcomeChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.buffer.length;
  }

  send(item: T): void {
    if (this.isClosed) {
      throw new Error('send on closed channel');
    }
    const next = this.waiting.shift();
    if (next) {
      next({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const next of this.waiting.splice(0)) {
      next({ value: undefined, done: true });
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
