import { promises as fs } from 'node:fs';
import { join } from 'node:path';

import type { LogEntry } from './types.js';

const MAX_QUEUE_SIZE = 1000;
const BATCH_SIZE = 50;
const FLUSH_INTERVAL_MS = 1000;

/**
 * Appends log entries as JSON lines to one file per process run. Writes are
 * queued and batched; the file is created with owner-only permissions.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private writeQueue: LogEntry[] = [];
  private inFlight: Promise<void> | null = null;
  private disposed = false;
  private flushTimeout: ReturnType<typeof setTimeout> | null = null;
  private readonly logFile: string;

  private constructor(private readonly directory: string) {
    const datePart = new Date().toISOString().slice(0, 10);
    this.logFile = join(directory, `sq-lsp-${process.pid}-${datePart}.jsonl`);
  }

  static getInstance(directory: string): FileOutput {
    if (
      !FileOutput.instance ||
      FileOutput.instance.disposed ||
      FileOutput.instance.directory !== directory
    ) {
      FileOutput.instance = new FileOutput(directory);
    }
    return FileOutput.instance;
  }

  get path(): string {
    return this.logFile;
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push(entry);
    if (this.writeQueue.length > MAX_QUEUE_SIZE) {
      this.writeQueue = this.writeQueue.slice(-MAX_QUEUE_SIZE);
    }

    if (this.writeQueue.length >= BATCH_SIZE || !this.inFlight) {
      await this.flushQueue();
    }
    this.startFlushTimer();
  }

  /**
   * Writes out everything queued, including a batch already being written,
   * then stops accepting entries.
   */
  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    while (this.inFlight || this.writeQueue.length > 0) {
      if (this.inFlight) {
        await this.inFlight;
        continue;
      }
      const before = this.writeQueue.length;
      await this.flushQueue();
      if (this.writeQueue.length >= before) {
        // append failed and requeued
        break;
      }
    }
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout || this.writeQueue.length === 0) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => this.startFlushTimer());
    }, FLUSH_INTERVAL_MS);
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    if (this.inFlight || this.writeQueue.length === 0 || this.disposed) {
      return;
    }

    this.inFlight = this.appendBatch(this.writeQueue.splice(0, BATCH_SIZE));
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async appendBatch(entries: LogEntry[]): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
      const jsonl =
        entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n';
      await fs.appendFile(this.logFile, jsonl, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch {
      // Requeue for the next flush, bounded.
      if (this.writeQueue.length < MAX_QUEUE_SIZE / 2) {
        this.writeQueue.unshift(...entries);
      }
    }
  }
}
