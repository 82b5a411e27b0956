import type { JsonRpcId } from './types.js';

export class LspClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LspClientError';
  }
}

/**
 * The server process could not be spawned, or `start()` was called on a
 * client that already left the `unstarted` state.
 */
export class LaunchError extends LspClientError {
  constructor(
    message: string,
    readonly command: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LaunchError';
  }
}

export class NotRunningError extends LspClientError {
  constructor(message = 'LSP server is not running') {
    super(message);
    this.name = 'NotRunningError';
  }
}

export class TimeoutError extends LspClientError {
  constructor(
    readonly method: string,
    readonly id: JsonRpcId,
    readonly timeoutMs: number,
  ) {
    super(`Request '${method}' (id ${String(id)}) timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Carries a JSON-RPC `error` object from the server verbatim.
 */
export class ProtocolError extends LspClientError {
  constructor(
    message: string,
    readonly code: number,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class FramingError extends LspClientError {
  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super(message);
    this.name = 'FramingError';
  }
}

export class ConfigError extends LspClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
