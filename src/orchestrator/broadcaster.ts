import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/**
 * One subscriber's view of a broadcast: an async iterable over a bounded
 * FIFO. When the buffer is full the oldest undelivered item is dropped, so a
 * slow reader never holds up the publisher.
 */
export class SubscriberQueue<T extends object> implements AsyncIterable<T> {
  private buffer: T[] = [];
  /** Pending reads, served in call order */
  private waiting: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    private capacity: number,
    private onClose: (queue: SubscriberQueue<T>) => void = () => undefined,
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when an older item had to be dropped to make room */
  push(item: T): boolean {
    if (this.closed) return true;

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return true;
    }

    let kept = true;
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
      kept = false;
    }
    this.buffer.push(item);
    return kept;
  }

  /** Ends iteration once buffered items are drained */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);

    for (const waiter of this.waiting.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) return Promise.resolve({ done: false, value: item });
    if (this.closed) return Promise.resolve({ done: true, value: undefined });

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }
}

/** Fans published items out to every open subscriber, in publish order */
export class Broadcaster<T extends object> {
  private subscribers = new Set<SubscriberQueue<T>>();

  constructor(
    private bufferSize: number,
    private logger: Logger = silentLogger,
  ) {
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new RangeError(`subscriber buffer size must be a positive integer, got ${bufferSize}`);
    }
  }

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(): SubscriberQueue<T> {
    const queue = new SubscriberQueue<T>(this.bufferSize, (closed) => this.subscribers.delete(closed));
    this.subscribers.add(queue);
    this.logger.debug('Subscriber attached', { subscribers: this.subscribers.size });
    return queue;
  }

  publish(item: T): void {
    for (const queue of this.subscribers) {
      if (!queue.push(item)) {
        this.logger.warn('Subscriber buffer full, dropped oldest event', { dropped: queue.dropped });
      }
    }
  }

  closeAll(): void {
    for (const queue of [...this.subscribers]) {
      queue.close();
    }
  }
}
