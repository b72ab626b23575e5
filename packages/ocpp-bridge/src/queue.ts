/** Rejects the tasks `clear` dropped before they ran. */
export class QueueClearedError extends Error {
  constructor() {
    super("Queue cleared before the task ran");
    this.name = "QueueClearedError";
  }
}

interface QueuedTask {
  run: () => Promise<void>;
  drop: (err: QueueClearedError) => void;
}

/**
 * A concurrency-limited async queue with a soft capacity.
 *
 * `push` always accepts work; `full` reports when the number of waiting
 * tasks has reached `capacity` so producers can apply back-pressure, and
 * `tryPush` refuses work instead. `whenReady()` resolves once there is room.
 */
export class BoundedQueue {
  private _concurrency: number;
  private _capacity: number;
  private _running = 0;
  private _queue: QueuedTask[] = [];
  private _waiters: Array<() => void> = [];

  constructor(capacity = 64, concurrency = 1) {
    this._capacity = Math.max(1, capacity);
    this._concurrency = Math.max(1, concurrency);
  }

  get capacity(): number {
    return this._capacity;
  }

  get concurrency(): number {
    return this._concurrency;
  }

  get pending(): number {
    return this._queue.length;
  }

  get running(): number {
    return this._running;
  }

  get size(): number {
    return this._running + this._queue.length;
  }

  get full(): boolean {
    return this._queue.length >= this._capacity;
  }

  push<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this._queue.push({
        run: () => Promise.resolve().then(fn).then(resolve, reject),
        drop: reject,
      });
      this._drain();
    });
  }

  /** Like `push`, but returns null without queueing when the queue is full. */
  tryPush<T>(fn: () => Promise<T>): Promise<T> | null {
    if (this.full) return null;
    return this.push(fn);
  }

  /** Resolves as soon as the queue has room for another task. */
  whenReady(): Promise<void> {
    if (!this.full) return Promise.resolve();
    return new Promise<void>((resolve) => this._waiters.push(resolve));
  }

  /**
   * Drops every task that has not started yet; their `push` promises reject
   * with `QueueClearedError`. Returns how many were dropped.
   */
  clear(): number {
    const dropped = this._queue;
    this._queue = [];
    this._notifyReady();
    for (const task of dropped) task.drop(new QueueClearedError());
    return dropped.length;
  }

  private _drain(): void {
    while (this._running < this._concurrency) {
      const task = this._queue.shift();
      if (!task) break;
      this._running++;
      this._notifyReady();

      void task.run().finally(() => {
        this._running--;
        this._drain();
      });
    }
  }

  private _notifyReady(): void {
    if (this.full || this._waiters.length === 0) return;
    const waiters = this._waiters;
    this._waiters = [];
    for (const wake of waiters) wake();
  }
}
