/**
 * Unbounded single-consumer queue. Producers `push` without waiting; the
 * consumer drains it with `for await` until `close()` has been called and the
 * buffer is empty.
 */
export class OutcomeChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private pendingRead?: (result: IteratorResult<T, undefined>) => void;
  private closed = false;

  push(value: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed channel");
    }
    const reader = this.pendingRead;
    if (reader) {
      this.pendingRead = undefined;
      reader({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  close(): void {
    this.closed = true;
    const reader = this.pendingRead;
    if (reader) {
      this.pendingRead = undefined;
      reader({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.read(),
    };
  }

  private read(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.pendingRead = resolve;
    });
  }
}
