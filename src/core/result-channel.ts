/**
 * Bounded multi-producer, single-consumer channel.
 *
 * Producers hold a `ChannelSender` each; the channel closes once the last
 * sender is released, after which the consumer drains whatever is buffered
 * and its iteration ends. A full buffer suspends `send()` until the consumer
 * takes a value, so nothing is ever dropped.
 */

import { ChannelClosedError } from './errors';

export interface ChannelSender<T> {
  send(value: T): Promise<void>;
  /** Idempotent; the channel closes when every sender has been released */
  release(): void;
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
}

export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private buffer: T[] = [];
  private pendingSends: PendingSend<T>[] = [];
  private pendingReceive: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private openSenders: number = 0;
  private closed: boolean = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  sender(): ChannelSender<T> {
    if (this.closed) {
      throw new ChannelClosedError('Cannot create a sender on a closed channel');
    }

    this.openSenders++;
    let released = false;

    return {
      send: (value: T) => {
        if (released) {
          return Promise.reject(new ChannelClosedError('Sender has already been released'));
        }
        return this.enqueue(value);
      },
      release: () => {
        if (released) return;
        released = true;
        this.releaseSender();
      }
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.buffer.length + this.pendingSends.length;
  }

  /**
   * Resolves with the next value, or `{ done: true }` once the channel is
   * closed and fully drained.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.pendingReceive) {
      return Promise.reject(new Error('ResultChannel supports a single consumer'));
    }

    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.admitPendingSend();
      return Promise.resolve({ done: false, value });
    }

    const waiting = this.pendingSends.shift();
    if (waiting) {
      waiting.resolve();
      return Promise.resolve({ done: false, value: waiting.value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.pendingReceive = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive()
    };
  }

  private enqueue(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.pendingReceive) {
      const deliver = this.pendingReceive;
      this.pendingReceive = null;
      deliver({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  private admitPendingSend(): void {
    const waiting = this.pendingSends.shift();
    if (waiting) {
      this.buffer.push(waiting.value);
      waiting.resolve();
    }
  }

  private releaseSender(): void {
    this.openSenders--;
    if (this.openSenders > 0) return;

    this.closed = true;

    // Buffer is necessarily empty while a receive is pending
    if (this.pendingReceive) {
      const finish = this.pendingReceive;
      this.pendingReceive = null;
      finish({ done: true, value: undefined });
    }
  }
}
