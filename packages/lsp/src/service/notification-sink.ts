import { DebugLogger } from '../debug/index.js';
import type { JsonRpcMessage } from '../types.js';

export const DEFAULT_NOTIFICATION_CAPACITY = 100;

const logger = DebugLogger.getLogger('sq:lsp:sink');

type Waiter = {
  resolve: (message: JsonRpcMessage) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Bounded queue of server-initiated messages. `push` never blocks the reader:
 * when the queue is full the oldest message is dropped.
 */
export class NotificationSink {
  private readonly queue: JsonRpcMessage[] = [];
  private readonly waiters: Waiter[] = [];
  private droppedCount = 0;
  private closedWith: Error | undefined;

  constructor(readonly capacity: number = DEFAULT_NOTIFICATION_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Notification capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  push(message: JsonRpcMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.detach(waiter);
      waiter.resolve(message);
      return;
    }

    if (this.queue.length >= this.capacity) {
      const evicted = this.queue.shift();
      this.droppedCount += 1;
      logger.warn(
        () =>
          `Notification queue full (${this.capacity}), dropped '${evicted?.method ?? 'unknown'}'`,
      );
    }
    this.queue.push(message);
  }

  shift(): JsonRpcMessage | undefined {
    return this.queue.shift();
  }

  drain(): JsonRpcMessage[] {
    return this.queue.splice(0, this.queue.length);
  }

  /**
   * Resolves with the next message, waiting for one if the queue is empty.
   */
  next(signal?: AbortSignal): Promise<JsonRpcMessage> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<JsonRpcMessage>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Rejects every pending `next()` call, and every later one once the queue
   * is empty. Queued messages stay readable.
   */
  close(reason: Error): void {
    this.closedWith = reason;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      this.detach(waiter);
      waiter.reject(reason);
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }
}
