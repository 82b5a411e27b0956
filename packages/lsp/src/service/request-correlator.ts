import { DebugLogger } from '../debug/index.js';
import { ProtocolError, TimeoutError } from '../errors.js';
import type { JsonRpcId, JsonRpcMessage } from '../types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

// Largest delay setTimeout honours; anything above fires after 1 ms.
export const MAX_REQUEST_TIMEOUT_MS = 2_147_483_647;

const logger = DebugLogger.getLogger('sq:lsp:correlator');

interface PendingCall {
  id: number;
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface RegisteredCall {
  id: number;
  response: Promise<unknown>;
}

// Servers may echo a numeric id back as a string.
const keyOf = (id: JsonRpcId): string => String(id);

/**
 * Issues request ids and matches responses to the callers waiting on them.
 * Allocation and registration happen in one synchronous step, so ids are
 * unique and increase in issuance order however many callers are in flight.
 */
export class RequestCorrelator {
  private nextId = 1;
  private readonly pending = new Map<string, PendingCall>();

  get size(): number {
    return this.pending.size;
  }

  has(id: JsonRpcId): boolean {
    return this.pending.has(keyOf(id));
  }

  register(
    method: string,
    timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  ): RegisteredCall {
    if (
      !Number.isInteger(timeoutMs) ||
      timeoutMs < 1 ||
      timeoutMs > MAX_REQUEST_TIMEOUT_MS
    ) {
      throw new RangeError(
        `Request timeout must be an integer between 1 and ${MAX_REQUEST_TIMEOUT_MS} ms, got ${timeoutMs}`,
      );
    }

    const id = this.nextId;
    this.nextId += 1;

    const response = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(keyOf(id))) {
          logger.warn(`Request '${method}' (id ${id}) timed out`);
          reject(new TimeoutError(method, id, timeoutMs));
        }
      }, timeoutMs);
      this.pending.set(keyOf(id), { id, method, resolve, reject, timer });
    });

    return { id, response };
  }

  /**
   * Settles the pending call matching `message.id`. Returns false for an
   * orphan response, which is logged and otherwise ignored.
   */
  deliver(message: JsonRpcMessage): boolean {
    if (message.id === undefined || message.id === null) {
      return false;
    }

    const key = keyOf(message.id);
    const call = this.pending.get(key);
    if (!call) {
      logger.debug(
        `Discarding response for id ${key}: no request is waiting on it`,
      );
      return false;
    }

    clearTimeout(call.timer);
    this.pending.delete(key);

    if (message.error) {
      call.reject(
        new ProtocolError(
          message.error.message,
          message.error.code,
          message.error.data,
        ),
      );
    } else {
      call.resolve(message.result ?? null);
    }
    return true;
  }

  cancel(id: JsonRpcId, error: Error): boolean {
    const key = keyOf(id);
    const call = this.pending.get(key);
    if (!call) {
      return false;
    }
    clearTimeout(call.timer);
    this.pending.delete(key);
    call.reject(error);
    return true;
  }

  rejectAll(error: Error): void {
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) {
      clearTimeout(call.timer);
      call.reject(error);
    }
    if (calls.length > 0) {
      logger.debug(
        () => `Rejected ${calls.length} pending call(s): ${error.message}`,
      );
    }
  }
}
