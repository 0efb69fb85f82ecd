type PendingRead = {
  resolve: (result: IteratorResult<string>) => void;
};

/**
 * Single-consumer async queue of text lines. Producers push in arrival order;
 * the consumer drains it with `for await`.
 */
export class LineQueue implements AsyncIterable<string> {
  private readonly buffered: string[] = [];
  private readonly waiting: PendingRead[] = [];
  private closed = false;

  push(line: string) {
    if (this.closed) return;
    const reader = this.waiting.shift();
    if (reader) {
      reader.resolve({ value: line, done: false });
      return;
    }
    this.buffered.push(line);
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const reader of this.waiting.splice(0)) {
      reader.resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<string>> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve({ value: line, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting.push({ resolve });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: () => this.next(),
    };
  }
}
