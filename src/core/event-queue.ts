/**
 * EventQueue: turns push-style callbacks into a pull-style async iterable.
 *
 * The producer calls push()/end()/fail() whenever it likes; the single
 * consumer iterates with for-await. Values pushed while nobody waits are
 * buffered in order.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private wakeConsumer: (() => void) | null = null;

  constructor(signal?: AbortSignal) {
    if (signal?.aborted) {
      this.closed = true;
    } else {
      signal?.addEventListener('abort', () => this.end(), { once: true });
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get done(): boolean {
    return this.closed;
  }

  /** Dropped once the queue has ended or failed. */
  push(value: T): void {
    if (this.closed) return;
    this.buffer.push(value);
    this.wake();
  }

  end(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
  }

  /** Buffered values are still delivered; the error is thrown after them. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;

      await new Promise<void>((resolve) => {
        this.wakeConsumer = resolve;
      });
      this.wakeConsumer = null;
    }
  }

  private wake(): void {
    this.wakeConsumer?.();
  }
}
