/**
 * Content-Length framing for JSON-RPC over byte streams:
 *
 *   Content-Length: <n>\r\n
 *   \r\n
 *   <n bytes of UTF-8 JSON>
 *
 * The decoder is byte-exact. A frame whose declared length overruns its body
 * eats into the following header block, exactly as a reader of the raw
 * stream would.
 */

import { z } from 'zod';

import { FramingError } from '../errors.js';
import type { JsonRpcMessage } from '../types.js';

export const CONTENT_LENGTH_HEADER = 'Content-Length:';

const LINE_FEED = 0x0a;

const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const jsonRpcMessageSchema = z.object({
  jsonrpc: z.literal('2.0').default('2.0'),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: jsonRpcErrorSchema.optional(),
});

export function encodeFrame(message: JsonRpcMessage): Buffer {
  const body = Buffer.from(
    JSON.stringify({ jsonrpc: '2.0', ...message }),
    'utf8',
  );
  const header = Buffer.from(
    `Content-Length: ${body.length}\r\n\r\n`,
    'ascii',
  );
  return Buffer.concat([header, body]);
}

/**
 * Parses the value of a `Content-Length:` header line. Returns `null` for
 * anything that is not a plain decimal integer.
 */
export function parseContentLength(line: string): number | null {
  if (!line.startsWith(CONTENT_LENGTH_HEADER)) {
    return null;
  }
  const value = line.slice(CONTENT_LENGTH_HEADER.length).trim();
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export function parseMessage(body: string): JsonRpcMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e) {
    throw new FramingError(
      `Invalid JSON in frame: ${e instanceof Error ? e.message : String(e)}`,
      body,
    );
  }

  const result = jsonRpcMessageSchema.safeParse(parsed);
  if (!result.success) {
    throw new FramingError(
      `Frame is not a JSON-RPC message: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
      body,
    );
  }
  return result.data;
}

export interface FrameDecoderOptions {
  onFramingError?: (error: FramingError) => void;
}

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  // null while reading headers, then the body length to read
  private bodyLength: number | null = null;
  private headerLength: number | undefined;

  constructor(private readonly options: FrameDecoderOptions = {}) {}

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  feed(chunk: Buffer): JsonRpcMessage[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const messages: JsonRpcMessage[] = [];

    while (true) {
      if (this.bodyLength === null) {
        if (!this.readHeaderLine()) {
          break;
        }
        continue;
      }

      if (this.buffer.length < this.bodyLength) {
        break;
      }

      const body = this.buffer.subarray(0, this.bodyLength).toString('utf8');
      this.buffer = this.buffer.subarray(this.bodyLength);
      this.bodyLength = null;

      try {
        messages.push(parseMessage(body));
      } catch (error) {
        if (!(error instanceof FramingError)) {
          throw error;
        }
        this.report(error);
      }
    }

    return messages;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.bodyLength = null;
    this.headerLength = undefined;
  }

  /**
   * Consumes one header line. Returns false when no complete line is
   * buffered yet.
   */
  private readHeaderLine(): boolean {
    const newline = this.buffer.indexOf(LINE_FEED);
    if (newline < 0) {
      return false;
    }

    const line = this.buffer.subarray(0, newline).toString('ascii').trim();
    this.buffer = this.buffer.subarray(newline + 1);

    if (line.length === 0) {
      const length = this.headerLength;
      this.headerLength = undefined;
      if (length === undefined || length === 0) {
        this.report(new FramingError('Header block has no Content-Length'));
        return true;
      }
      this.bodyLength = length;
      return true;
    }

    if (line.startsWith(CONTENT_LENGTH_HEADER)) {
      const length = parseContentLength(line);
      if (length === null) {
        this.report(new FramingError(`Invalid Content-Length header: ${line}`));
      } else {
        this.headerLength = length;
      }
    }
    return true;
  }

  private report(error: FramingError): void {
    this.options.onFramingError?.(error);
  }
}
