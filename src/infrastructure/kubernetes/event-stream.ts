/**
 * Watch event stream
 *
 * Adapts the callback-based Kubernetes watch to an async iterable. Events are
 * buffered until read; the stream ends once, either cleanly or with an error.
 */

export interface EventStream<T> extends AsyncIterable<T> {
  /**
   * Stop the stream. With a reason, a pending or later read rejects with it.
   */
  close(reason?: Error): void;
}

interface PendingRead<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

export class WatchEventStream<T> implements EventStream<T> {
  private readonly buffered: T[] = [];
  private pending: PendingRead<T> | undefined;
  private ended = false;
  private closed = false;
  private failure: Error | undefined;

  constructor(private readonly onClose: () => void = () => undefined) {}

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Producer side: deliver one event. Ignored after the stream ended.
   */
  push(event: T): void {
    if (this.ended) return;

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.resolve({ done: false, value: event });
      return;
    }
    this.buffered.push(event);
  }

  /**
   * Producer side: end the stream, optionally with an error.
   */
  end(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error;

    const pending = this.pending;
    if (!pending) return;
    this.pending = undefined;
    if (error) {
      pending.reject(error);
    } else {
      pending.resolve({ done: true, value: undefined });
    }
  }

  close(reason?: Error): void {
    this.end(reason);
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffered.length > 0) {
      const value = this.buffered[0];
      this.buffered.shift();
      return Promise.resolve({ done: false, value });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }
}
