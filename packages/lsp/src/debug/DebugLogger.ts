import createDebug from 'debug';
import type { Debugger } from 'debug';

import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { LogEntry, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

type MessageOrFn = string | (() => string);

/**
 * Namespaced logger on top of `debug`. Output goes to a JSON-lines file by
 * default so a terminal UI hosting the client is never written over; the
 * `stderr` target is opt-in through `SQ_LSP_DEBUG_OUTPUT`.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly configManager: ConfigurationManager;
  private _enabled: boolean;
  private readonly boundOnConfigChange: () => void;

  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger.configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(readonly namespace: string) {
    this.debugInstance = createDebug(namespace);
    // Gating happens in write(); `debug` must not filter a second time.
    this.debugInstance.enabled = true;
    this.configManager = ConfigurationManager.getInstance();
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => {
      this._enabled = this.checkEnabled();
    };
    this.configManager.subscribe(this.boundOnConfigChange);
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get fileOutput(): FileOutput {
    return FileOutput.getInstance(this.configManager.getOutputDirectory());
  }

  debug(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  warn(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this.configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this.namespace, pattern),
    );
  }

  private write(
    level: LogLevel,
    messageOrFn: MessageOrFn,
    args: unknown[],
  ): void {
    if (!this._enabled) {
      return;
    }

    const threshold = this.configManager.getEffectiveConfig().level;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }
    message = this.redactSensitive(message);

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this.namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    };

    const target = this.configManager.getOutputTarget();
    if (target.includes('file')) {
      void this.fileOutput.write(entry);
    }
    if (target.includes('stderr')) {
      this.debugInstance(`[${level}] ${message}`, ...args);
    }
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (!pattern.includes('*')) {
      return false;
    }
    const regexPattern = pattern
      .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*');
    return new RegExp(`^${regexPattern}$`).test(namespace);
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this.configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }
}
