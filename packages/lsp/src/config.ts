import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ConfigError } from './errors.js';
import { DEFAULT_NOTIFICATION_CAPACITY } from './service/notification-sink.js';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  MAX_REQUEST_TIMEOUT_MS,
} from './service/request-correlator.js';

export const SQLS_COMMAND = 'sqls';

export const lspClientConfigSchema = z.object({
  command: z.string().min(1, 'command must be a non-empty string'),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_REQUEST_TIMEOUT_MS)
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  notificationCapacity: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_NOTIFICATION_CAPACITY),
});

export type LspClientConfig = z.infer<typeof lspClientConfigSchema>;
export type LspClientConfigInput = z.input<typeof lspClientConfigSchema>;

export function parseClientConfig(value: unknown): LspClientConfig {
  const result = lspClientConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid LSP client config: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

export async function loadClientConfig(path: string): Promise<LspClientConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read LSP client config '${path}'`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`LSP client config '${path}' is not valid JSON`, {
      cause: error,
    });
  }
  return parseClientConfig(parsed);
}

/**
 * Launch settings for the `sqls` SQL language server reading its connection
 * list from `configPath`.
 */
export function sqlsClientConfig(
  configPath: string,
  overrides: Omit<LspClientConfigInput, 'command' | 'args'> = {},
): LspClientConfig {
  return parseClientConfig({
    ...overrides,
    command: SQLS_COMMAND,
    args: ['-config', configPath],
  });
}
