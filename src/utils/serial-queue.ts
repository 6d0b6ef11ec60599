/**
 * SerialTaskQueue - one task at a time, in arrival order
 *
 * A conversation turn mutates graph activation, the random source and
 * memory, so turns arriving over HTTP must not overlap. Tasks beyond
 * `maxPending` are rejected instead of queued.
 *
 * @module utils/serial-queue
 */

export class QueueFullError extends Error {
  constructor(label: string, pending: number) {
    super(`Queue full, rejected ${label} (pending=${pending})`);
    this.name = 'QueueFullError';
  }
}

interface QueueEntry {
  run: () => Promise<void>;
}

export class SerialTaskQueue {
  private queue: QueueEntry[] = [];
  private running = false;
  private _rejected = 0;
  private maxPending: number;

  constructor(maxPending: number = 100) {
    this.maxPending = maxPending;
  }

  /**
   * Enqueue a task; resolves or rejects with the task's own outcome
   */
  run<T>(task: () => Promise<T>, label: string = 'task'): Promise<T> {
    if (this.queue.length >= this.maxPending) {
      this._rejected++;
      return Promise.reject(new QueueFullError(label, this.queue.length));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(task).then(resolve, reject),
      });
      if (!this.running) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.running = true;
    let entry = this.queue.shift();
    while (entry) {
      await entry.run();
      entry = this.queue.shift();
    }
    this.running = false;
  }

  /** Number of tasks waiting in the queue */
  get pendingCount(): number {
    return this.queue.length;
  }

  /** Total tasks rejected due to queue overflow */
  get rejectedCount(): number {
    return this._rejected;
  }
}
