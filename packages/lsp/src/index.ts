export {
  LspClient,
  createLspClient,
  createSqlsClient,
  type LspClientOptions,
} from './service/lsp-client.js';
export {
  ProcessSupervisor,
  type ProcessSupervisorOptions,
  type SpawnFunction,
  type StartOptions,
} from './service/process-supervisor.js';
export {
  RequestCorrelator,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MAX_REQUEST_TIMEOUT_MS,
  type RegisteredCall,
} from './service/request-correlator.js';
export {
  NotificationSink,
  DEFAULT_NOTIFICATION_CAPACITY,
} from './service/notification-sink.js';
export { toCompletionItems, toHoverText } from './service/results.js';
export {
  encodeFrame,
  FrameDecoder,
  parseContentLength,
  parseMessage,
  type FrameDecoderOptions,
} from './codec/frame-codec.js';
export {
  loadClientConfig,
  parseClientConfig,
  sqlsClientConfig,
  lspClientConfigSchema,
  SQLS_COMMAND,
  type LspClientConfig,
  type LspClientConfigInput,
} from './config.js';
export {
  LspClientError,
  LaunchError,
  NotRunningError,
  TimeoutError,
  ProtocolError,
  FramingError,
  ConfigError,
} from './errors.js';
export { classifyMessage } from './types.js';
export type {
  ClientState,
  CompletionItem,
  InitializeResult,
  JsonRpcError,
  JsonRpcId,
  JsonRpcMessage,
  MessageKind,
  Position,
} from './types.js';
export { DebugLogger } from './debug/index.js';
