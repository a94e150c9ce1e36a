/**
 * Push-to-pull bridge
 *
 * viem delivers subscription data through callbacks; the collector consumes
 * async iterators. Items are handed out in push order. Once ended, pending
 * and future pulls resolve as done; once failed, the next pull after the
 * buffer drains rejects with the failure and later pulls resolve as done.
 *
 * @module feed/AsyncQueue
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private ended = false;
  private failure?: Error;
  private onClose?: () => void;

  /**
   * @param onClose - Invoked once when the consumer stops pulling or the queue ends
   */
  constructor(onClose?: () => void) {
    this.onClose = onClose;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  push(item: T): void {
    if (this.ended) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return;
    }
    this.buffer.push(item);
  }

  /**
   * Ends the queue. Buffered items are still delivered.
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.release();

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  /**
   * Ends the queue with an error, surfaced after buffered items.
   */
  fail(error: Error): void {
    if (this.ended) return;
    this.failure = error;

    const waiters = this.waiters.splice(0);
    if (waiters.length > 0) {
      this.failure = undefined;
      waiters[0].reject(error);
      for (const waiter of waiters.slice(1)) {
        waiter.resolve({ done: true, value: undefined });
      }
    }
    this.end();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value: item });
    }

    if (this.failure) {
      const failure = this.failure;
      this.failure = undefined;
      return Promise.reject(failure);
    }

    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.buffer = [];
    this.failure = undefined;
    this.end();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private release(): void {
    const onClose = this.onClose;
    this.onClose = undefined;
    onClose?.();
  }
}
