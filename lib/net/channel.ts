/**
 * Bounded multi-producer / single-consumer channel.
 *
 * `send()` suspends while `capacity` items are buffered; `receive()` suspends
 * while the buffer is empty. After `close()` the consumer drains what is left
 * and then sees `done`.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super('send on closed channel');
    this.name = 'ChannelClosedError';
  }
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waitingSenders: Array<() => void> = [];
  private readonly waitingReceivers: Array<(r: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new TypeError('Expected `capacity` to be an integer >= 1');
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<void> {
    if (this.closed) throw new ChannelClosedError();

    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return;
    }

    while (this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingSenders.push(resolve));
      if (this.closed) throw new ChannelClosedError();
    }
    this.buffer.push(value);
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.waitingSenders.shift()?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waitingReceivers.push(resolve));
  }

  /** Idempotent. Wakes suspended senders (they reject) and receivers (they see `done`). */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.waitingReceivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.waitingSenders.splice(0)) {
      sender();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}
