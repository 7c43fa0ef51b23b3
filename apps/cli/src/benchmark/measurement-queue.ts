import { BenchmarkStateError } from "../common/errors.js";

type Waiter<T> = (value: T) => void;

/**
 * Bounded hand-off between many producers and a single consumer.
 *
 * `push` resolves once the item is either delivered to the waiting consumer or buffered;
 * while the buffer is full, producers queue up in arrival order.
 * `take` resolves with the oldest item. Only one `take` may be pending at a time.
 */
export class MeasurementQueue<T extends {}> {
  private readonly buffer: T[] = [];
  private readonly blockedProducers: Array<{ item: T; resume: () => void }> = [];
  private consumer: Waiter<T> | null = null;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  push(item: T): Promise<void> {
    if (this.consumer) {
      const deliver = this.consumer;
      this.consumer = null;
      deliver(item);
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resume) => {
      this.blockedProducers.push({ item, resume });
    });
  }

  take(): Promise<T> {
    if (this.consumer) {
      throw new BenchmarkStateError("MeasurementQueue supports a single consumer; a take() is already pending");
    }

    const next = this.buffer.shift();
    if (next !== undefined) {
      this.admitBlockedProducer();
      return Promise.resolve(next);
    }

    return new Promise<T>((resolve) => {
      this.consumer = resolve;
    });
  }

  private admitBlockedProducer(): void {
    const producer = this.blockedProducers.shift();
    if (producer) {
      this.buffer.push(producer.item);
      producer.resume();
    }
  }
}
