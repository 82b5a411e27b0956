export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugOutputConfig {
  target: string;
  directory?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: LogLevel;
  output: DebugOutputConfig;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  pid: number;
}
