export type JsonRpcId = number | string;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * One JSON-RPC envelope as it travels on the wire. Requests, notifications
 * and responses share the shape; {@link classifyMessage} tells them apart.
 */
export interface JsonRpcMessage {
  jsonrpc: '2.0';
  id?: JsonRpcId | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: JsonRpcError;
}

export type MessageKind = 'request' | 'response' | 'notification' | 'invalid';

export function classifyMessage(message: JsonRpcMessage): MessageKind {
  const hasId = message.id !== undefined && message.id !== null;
  const hasMethod = typeof message.method === 'string';

  if (hasId && hasMethod) {
    return 'request';
  }
  if (hasId) {
    return 'response';
  }
  if (hasMethod) {
    return 'notification';
  }
  return 'invalid';
}

export interface Position {
  line: number;
  character: number;
}

/**
 * The server's `initialize` answer. Only `capabilities` is required; every
 * other field (`serverInfo`, vendor extensions) is passed through as sent.
 */
export interface InitializeResult {
  capabilities: Record<string, unknown>;
  [key: string]: unknown;
}

export interface CompletionItem {
  label: string;
  kind?: number;
  detail?: string;
  documentation?: string;
  insertText: string;
}

export type ClientState = 'unstarted' | 'running' | 'stopped';
