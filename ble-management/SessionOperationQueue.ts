/**
 * Session Operation Queue
 *
 * Per-session mailbox. Caller operations and transport messages (link lost) are
 * run one at a time in arrival order, so session state has a single writer and a
 * recovery sequence cannot interleave with anything else on the same session.
 * Queues of different sessions run independently.
 */

import { bleLogger, describeError } from '../ble-bridge';

type Operation<T> = () => Promise<T>;

interface QueuedOperation {
  label: string;
  run: () => Promise<void>;
}

export class SessionOperationQueue {
  private queue: QueuedOperation[] = [];
  private isProcessing = false;
  private currentLabel: string | null = null;
  private drainWaiters: Array<() => void> = [];

  constructor(private readonly ownerId: string) {}

  /**
   * Enqueue an operation and settle with its result
   */
  submit<T>(label: string, operation: Operation<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue({
        label,
        run: () => Promise.resolve().then(operation).then(resolve, reject),
      });
    });
  }

  /**
   * Enqueue a message nobody awaits; a failure is logged
   */
  post(label: string, operation: Operation<void>): void {
    this.enqueue({
      label,
      run: () => Promise.resolve().then(operation).catch(error => {
        bleLogger.error(`Queued ${label} failed`, { deviceId: this.ownerId, ...describeError(error) }, 'QUEUE');
      }),
    });
  }

  /**
   * Resolve once everything queued so far (and anything it enqueues) has run
   */
  idle(): Promise<void> {
    if (!this.isProcessing && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.drainWaiters.push(resolve));
  }

  getStatus(): { queueLength: number; isProcessing: boolean; current: string | null } {
    return {
      queueLength: this.queue.length,
      isProcessing: this.isProcessing,
      current: this.currentLabel,
    };
  }

  private enqueue(item: QueuedOperation): void {
    this.queue.push(item);
    bleLogger.debug(`Enqueued ${item.label}`, { deviceId: this.ownerId, queueLength: this.queue.length }, 'QUEUE');

    if (!this.isProcessing) {
      void this.processQueue();
    }
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true;

    let next = this.queue.shift();
    while (next) {
      this.currentLabel = next.label;
      // run() never rejects: submit forwards failures to its caller, post logs them
      await next.run();
      next = this.queue.shift();
    }

    this.isProcessing = false;
    this.currentLabel = null;

    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
