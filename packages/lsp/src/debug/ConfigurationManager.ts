import { homedir } from 'node:os';
import { join } from 'node:path';

import type { DebugSettings, LogLevel } from './types.js';

export const SQ_DIR = '.sq';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'log', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private envConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    const home = homedir();
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: {
        target: 'file',
        directory: join(home || process.cwd(), SQ_DIR, 'debug'),
      },
      redactPatterns: ['password', 'passwd', 'token', 'dataSourceName'],
    };
    this.mergedConfig = this.defaultConfig;
    this.loadEnvironmentConfig();
    this.mergeConfigurations();
  }

  // SQ_LSP_DEBUG wins over DEBUG; DEBUG only counts when it names sq namespaces.
  private loadEnvironmentConfig(): void {
    let config: Partial<DebugSettings> = {};

    if (process.env.DEBUG) {
      const namespaces = this.parseDebugEnv(process.env.DEBUG).filter(
        (ns) => ns.startsWith('sq') || ns === '*',
      );
      if (namespaces.length > 0) {
        config = { enabled: true, namespaces };
      }
    }

    if (process.env.SQ_LSP_DEBUG) {
      config = {
        enabled: true,
        namespaces: this.parseDebugEnv(process.env.SQ_LSP_DEBUG),
      };
    }

    const level = process.env.SQ_LSP_DEBUG_LEVEL;
    if (level && isLogLevel(level)) {
      config = { ...config, level };
    }

    if (process.env.SQ_LSP_DEBUG_OUTPUT) {
      config = {
        ...config,
        output: {
          ...this.defaultConfig.output,
          target: process.env.SQ_LSP_DEBUG_OUTPUT,
        },
      };
    }

    this.envConfig = Object.keys(config).length > 0 ? config : null;
  }

  private mergeConfigurations(): void {
    this.mergedConfig = {
      ...this.defaultConfig,
      ...this.envConfig,
      ...this.ephemeralConfig,
    };
    this.listeners.forEach((listener) => listener());
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    return this.mergedConfig.output.target;
  }

  getOutputDirectory(): string {
    return (
      this.mergedConfig.output.directory ??
      this.defaultConfig.output.directory ??
      join(process.cwd(), SQ_DIR, 'debug')
    );
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
