import { z } from 'zod';

import { encodeFrame } from '../codec/frame-codec.js';
import {
  parseClientConfig,
  sqlsClientConfig,
  type LspClientConfig,
  type LspClientConfigInput,
} from '../config.js';
import { DebugLogger } from '../debug/index.js';
import {
  LaunchError,
  NotRunningError,
  ProtocolError,
  type FramingError,
} from '../errors.js';
import {
  classifyMessage,
  type ClientState,
  type CompletionItem,
  type InitializeResult,
  type JsonRpcMessage,
  type Position,
} from '../types.js';
import { NotificationSink } from './notification-sink.js';
import {
  ProcessSupervisor,
  type SpawnFunction,
} from './process-supervisor.js';
import { RequestCorrelator } from './request-correlator.js';
import { toCompletionItems, toHoverText } from './results.js';

const logger = DebugLogger.getLogger('sq:lsp:client');

// JSON-RPC "Internal error"; used when a result does not have the shape the
// protocol promises.
const INVALID_RESULT_CODE = -32603;

const initializeResultSchema = z
  .object({
    capabilities: z.record(z.unknown()),
  })
  .passthrough();

const positionParams = (
  uri: string,
  line: number,
  character: number,
): { textDocument: { uri: string }; position: Position } => ({
  textDocument: { uri },
  position: { line, character },
});

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export interface LspClientOptions {
  spawn?: SpawnFunction;
  /** Called for every frame that is skipped as malformed. */
  onFramingError?: (error: FramingError) => void;
}

/**
 * Client for one language server child process speaking JSON-RPC over
 * stdio. Lifecycle is `unstarted → running → stopped`; a stopped client
 * cannot be restarted.
 */
export class LspClient {
  private state: ClientState = 'unstarted';
  private stopReason: string | undefined;
  private readonly config: LspClientConfig;
  private readonly supervisor: ProcessSupervisor;
  private readonly correlator = new RequestCorrelator();
  readonly notifications: NotificationSink;

  constructor(config: LspClientConfigInput, options: LspClientOptions = {}) {
    this.config = parseClientConfig(config);
    this.notifications = new NotificationSink(this.config.notificationCapacity);
    this.supervisor = new ProcessSupervisor({
      spawn: options.spawn,
      onMessage: (message) => this.handleMessage(message),
      onFramingError: options.onFramingError,
      onExit: (reason) => this.handleExit(reason),
    });
  }

  getState(): ClientState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  get pendingRequests(): number {
    return this.correlator.size;
  }

  async start(): Promise<void> {
    const { command, args, cwd, env } = this.config;
    if (this.state !== 'unstarted') {
      throw new LaunchError(
        this.state === 'running'
          ? `LSP client for '${command}' is already running`
          : `LSP client for '${command}' was stopped; create a new client`,
        command,
      );
    }

    this.state = 'running';
    try {
      await this.supervisor.start(command, args, { cwd, env });
    } catch (error) {
      this.state = 'stopped';
      this.stopReason = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to start LSP server: ${this.stopReason}`);
      throw error;
    }
    logger.debug(() => `LSP client started for ${command}`);
  }

  async stop(): Promise<void> {
    if (this.state !== 'stopped') {
      this.state = 'stopped';
      this.stopReason = 'LSP client was stopped';
    }
    const error = new NotRunningError(this.stopReason);
    this.correlator.rejectAll(error);
    this.notifications.close(error);
    await this.supervisor.stop();
  }

  /**
   * Sends a request and resolves with its `result`. Rejects with
   * `ProtocolError` when the server answers with an error, `TimeoutError`
   * when no answer arrives in time, and `NotRunningError` when the client is
   * not running or the server goes away.
   */
  async call(
    method: string,
    params?: unknown,
    timeoutMs: number = this.config.requestTimeoutMs,
  ): Promise<unknown> {
    this.ensureRunning(method);

    const { id, response } = this.correlator.register(method, timeoutMs);
    let frame: Buffer;
    try {
      frame = encodeFrame({ jsonrpc: '2.0', id, method, params });
    } catch (error) {
      // params that JSON cannot represent (cycles, BigInt)
      this.correlator.cancel(id, toError(error));
      return await response;
    }
    logger.debug(() => `--> ${method} (id ${id}, ${frame.length} bytes)`);

    void this.supervisor.write(frame).catch((error: unknown) => {
      this.correlator.cancel(id, toError(error));
    });

    return await response;
  }

  async notify(method: string, params?: unknown): Promise<void> {
    this.ensureRunning(method);

    const frame = encodeFrame({ jsonrpc: '2.0', method, params });
    logger.debug(() => `--> ${method} (notification, ${frame.length} bytes)`);
    await this.supervisor.write(frame);
  }

  async initialize(
    rootUri: string,
    capabilities: Record<string, unknown> = {},
  ): Promise<InitializeResult> {
    const result = await this.call('initialize', {
      processId: null,
      rootUri,
      capabilities,
    });

    const parsed = initializeResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ProtocolError(
        'Invalid initialize result: missing capabilities',
        INVALID_RESULT_CODE,
        result,
      );
    }
    return parsed.data;
  }

  async initialized(): Promise<void> {
    await this.notify('initialized', {});
  }

  async didOpen(uri: string, languageId: string, text: string): Promise<void> {
    await this.notify('textDocument/didOpen', {
      textDocument: { uri, languageId, version: 1, text },
    });
  }

  async didChange(uri: string, text: string, version: number): Promise<void> {
    await this.notify('textDocument/didChange', {
      textDocument: { uri, version },
      contentChanges: [{ text }],
    });
  }

  async completion(
    uri: string,
    line: number,
    character: number,
  ): Promise<unknown> {
    return await this.call(
      'textDocument/completion',
      positionParams(uri, line, character),
    );
  }

  async hover(uri: string, line: number, character: number): Promise<unknown> {
    return await this.call(
      'textDocument/hover',
      positionParams(uri, line, character),
    );
  }

  async completionItems(
    uri: string,
    line: number,
    character: number,
  ): Promise<CompletionItem[]> {
    return toCompletionItems(await this.completion(uri, line, character));
  }

  async hoverText(
    uri: string,
    line: number,
    character: number,
  ): Promise<string | null> {
    return toHoverText(await this.hover(uri, line, character));
  }

  private ensureRunning(method: string): void {
    if (this.state !== 'running') {
      throw new NotRunningError(
        `Cannot send '${method}': ${this.stopReason ?? 'LSP client has not been started'}`,
      );
    }
  }

  private handleMessage(message: JsonRpcMessage): void {
    const kind = classifyMessage(message);
    logger.debug(
      () =>
        `<-- ${kind} ${message.method ?? ''}${message.id !== undefined ? ` (id ${String(message.id)})` : ''}`,
    );

    switch (kind) {
      case 'response':
        this.correlator.deliver(message);
        return;
      case 'notification':
        this.notifications.push(message);
        return;
      case 'request':
        logger.debug(
          `Server request '${message.method ?? ''}' left unanswered; queued as notification`,
        );
        this.notifications.push(message);
        return;
      case 'invalid':
        logger.warn('Dropping message with neither id nor method');
        return;
    }
  }

  private handleExit(reason: string): void {
    if (this.state === 'stopped') {
      return;
    }
    this.state = 'stopped';
    this.stopReason = reason;
    logger.warn(reason);

    const error = new NotRunningError(reason);
    this.correlator.rejectAll(error);
    this.notifications.close(error);
  }
}

export function createLspClient(
  config: LspClientConfigInput,
  options?: LspClientOptions,
): LspClient {
  return new LspClient(config, options);
}

export function createSqlsClient(
  configPath: string,
  options?: LspClientOptions,
): LspClient {
  return new LspClient(sqlsClientConfig(configPath), options);
}
