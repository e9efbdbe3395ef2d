/**
 * @payledger/engine — Single-consumer FIFO mailbox.
 *
 * The private queue of one client worker. The dispatcher posts records,
 * the worker drains them with `for await`. Posting never blocks: the
 * queue is unbounded.
 *
 * Guarantees:
 * - FIFO: messages are delivered in post order
 * - Exactly one consumer may wait at a time
 * - After close(), queued messages are still delivered, then iteration ends
 * - After discard(), queued messages are dropped and iteration ends
 */

export class MailboxClosedError extends Error {
  constructor() {
    super("Cannot post to a closed mailbox");
    this.name = "MailboxClosedError";
  }
}

export class Mailbox<T> implements AsyncIterable<T> {
  private _queue: T[] = [];
  private _head = 0;
  private _closed = false;
  private _waiter: ((result: IteratorResult<T, undefined>) => void) | undefined;

  /**
   * Enqueue a message, handing it straight to a waiting consumer if any.
   */
  post(message: T): void {
    if (this._closed) {
      throw new MailboxClosedError();
    }

    const waiter = this._waiter;
    if (waiter !== undefined) {
      this._waiter = undefined;
      waiter({ done: false, value: message });
      return;
    }

    this._queue.push(message);
  }

  /**
   * Signal end of input. Idempotent.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    const waiter = this._waiter;
    if (waiter !== undefined) {
      this._waiter = undefined;
      waiter({ done: true, value: undefined });
    }
  }

  /**
   * Close and drop every queued message. Returns how many were dropped.
   */
  discard(): number {
    const dropped = this.pending;
    this._queue = [];
    this._head = 0;
    this.close();
    return dropped;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Messages posted but not yet taken. */
  get pending(): number {
    return this._queue.length - this._head;
  }

  /**
   * Take the next message, waiting until one is posted or the mailbox closes.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this._head < this._queue.length) {
      const message = this._queue[this._head]!;
      this._head++;
      // Compact: reset when fully drained
      if (this._head === this._queue.length) {
        this._queue = [];
        this._head = 0;
      }
      return Promise.resolve({ done: false, value: message });
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    if (this._waiter !== undefined) {
      return Promise.reject(new Error("Mailbox supports a single consumer"));
    }

    return new Promise((resolve) => {
      this._waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
