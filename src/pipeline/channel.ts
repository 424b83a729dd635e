import { ChannelClosedError } from '../shared/errors.js';

export const DEFAULT_CHANNEL_CAPACITY = 200;

interface PendingSend<T> {
  item: T;
  resolve: () => void;
}

/**
 * Bounded FIFO handoff between one producer and one consumer.
 *
 * `send` resolves once the item is buffered (or handed straight to a
 * waiting receiver) and stays pending while the buffer is full, which
 * is what holds a fast producer back. `recv` resolves `undefined` only
 * after `close()` and once every buffered or pending item is taken.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private readonly receivers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items buffered and not yet received, excluding blocked senders. */
  get length(): number {
    return this.buffer.length;
  }

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.pendingSends.push({ item, resolve });
    });
  }

  recv(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      this.admitPendingSend();
      return Promise.resolve(item);
    }

    // Capacity is at least one, so a blocked sender implies a non-empty
    // buffer; this branch only sees an empty, unblocked channel.
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Marks the end of input. Buffered items and blocked senders are still
   * delivered in order; receivers waiting on an empty channel get
   * `undefined`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (let item = await this.recv(); item !== undefined; item = await this.recv()) {
      yield item;
    }
  }

  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (pending) {
      this.buffer.push(pending.item);
      pending.resolve();
    }
  }
}
