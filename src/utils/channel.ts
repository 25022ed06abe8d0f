/**
 * Raised by `send` once the channel has been closed.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super("Channel is closed");
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  readonly value: T;
  readonly resolve: () => void;
  readonly reject: (reason: Error) => void;
}

/**
 * Bounded FIFO hand-off between one producer and one consumer.
 *
 * `send` suspends while `capacity` items are buffered, `receive` suspends while none are.
 * Items are received in exactly the order they were sent.
 */
export class Channel<T> {
  private readonly buffer: T[] = [];
  private readonly blockedSends: PendingSend<T>[] = [];
  private readonly waitingReceivers: Array<(value: T) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Number of items currently buffered.
   */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Enqueue a value, waiting for room when the buffer is full.
   *
   * @throws ChannelClosedError if the channel is closed before the value is accepted.
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.blockedSends.push({ value, resolve, reject });
    });
  }

  /**
   * Dequeue the oldest value, waiting for one when the buffer is empty.
   */
  receive(): Promise<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const blocked = this.blockedSends.shift();
      if (blocked) {
        this.buffer.push(blocked.value);
        blocked.resolve();
      }
      return Promise.resolve(value);
    }
    return new Promise(resolve => {
      this.waitingReceivers.push(resolve);
    });
  }

  /**
   * Stop accepting values. Blocked and future sends reject; buffered values stay receivable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const blocked of this.blockedSends.splice(0)) {
      blocked.reject(new ChannelClosedError());
    }
  }
}
