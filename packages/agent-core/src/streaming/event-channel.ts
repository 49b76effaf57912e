/**
 * Unbounded, ordered, single-consumer async queue.
 *
 * The producer writes and finally closes; the consumer iterates. Readers
 * waiting on an empty buffer are resolved directly by the next write.
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closed = false;
  private discarded = false;

  /** Consumers waiting for the next item */
  private resolvers: Array<(value: IteratorResult<T, undefined>) => void> = [];

  get isClosed(): boolean {
    return this.closed;
  }

  /** Writes after close() or discard() are dropped */
  write(item: T): void {
    if (this.closed || this.discarded) {
      return;
    }
    const resolve = this.resolvers.shift();
    if (resolve) {
      resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  /** Buffered items are still delivered after close */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const resolve of this.resolvers) {
      resolve({ value: undefined, done: true });
    }
    this.resolvers = [];
  }

  /** Drop everything not yet read, and every later write */
  discard(): void {
    this.discarded = true;
    this.buffer.length = 0;
  }

  read(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      if (item !== undefined) {
        return Promise.resolve({ value: item, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.resolvers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.read() };
  }
}
