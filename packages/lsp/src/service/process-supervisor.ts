import { spawn as nodeSpawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { once } from 'node:events';

import { FrameDecoder } from '../codec/frame-codec.js';
import { DebugLogger } from '../debug/index.js';
import { FramingError, LaunchError, NotRunningError } from '../errors.js';
import type { JsonRpcMessage } from '../types.js';

const logger = DebugLogger.getLogger('sq:lsp:process');

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface ProcessSupervisorOptions {
  onMessage: (message: JsonRpcMessage) => void;
  onFramingError?: (error: FramingError) => void;
  onExit?: (reason: string) => void;
  spawn?: SpawnFunction;
}

export interface StartOptions {
  cwd?: string;
  env?: Record<string, string>;
}

type SupervisorState = 'idle' | 'running' | 'dead';

/**
 * Owns the server child process: its stdin for outbound frames and its
 * stdout, decoded frame by frame into messages. stderr is discarded so the
 * server's chatter never reaches the host terminal and never fills a pipe.
 */
export class ProcessSupervisor {
  private child: ChildProcess | null = null;
  private state: SupervisorState = 'idle';
  private exitReason: string | undefined;
  private stopping: Promise<void> | null = null;
  private readonly decoder: FrameDecoder;
  private readonly spawnProcess: SpawnFunction;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.spawnProcess = options.spawn ?? nodeSpawn;
    this.decoder = new FrameDecoder({
      onFramingError: (error) => {
        logger.warn(`Skipping malformed frame: ${error.message}`);
        options.onFramingError?.(error);
      },
    });
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(
    command: string,
    args: readonly string[] = [],
    startOptions: StartOptions = {},
  ): Promise<void> {
    if (this.state !== 'idle') {
      throw new LaunchError(
        `Cannot start '${command}': process supervisor already used`,
        command,
      );
    }
    this.state = 'dead';

    logger.debug(() => `Spawning ${command} ${args.join(' ')}`.trim());

    let child: ChildProcess;
    try {
      child = this.spawnProcess(command, args, {
        cwd: startOptions.cwd,
        env: startOptions.env
          ? { ...process.env, ...startOptions.env }
          : process.env,
        stdio: ['pipe', 'pipe', 'ignore'],
      });
    } catch (error) {
      throw new LaunchError(`Failed to spawn '${command}'`, command, {
        cause: error,
      });
    }

    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      throw new LaunchError(
        `Failed to open stdio pipes for '${command}'`,
        command,
      );
    }

    // Visible to stop() from here on, so a stop during startup reaps it.
    this.child = child;

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = (): void => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error): void => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });
    } catch (error) {
      this.child = null;
      throw new LaunchError(
        `Failed to start '${command}': ${error instanceof Error ? error.message : String(error)}`,
        command,
        { cause: error },
      );
    }

    if (this.stopping) {
      await this.stopping;
      throw new LaunchError(
        `LSP server '${command}' was stopped while starting`,
        command,
      );
    }

    this.state = 'running';

    child.once('exit', (code, signal) => {
      this.markDead(
        `LSP server '${command}' exited (code=${code ?? 'null'}, signal=${signal ?? 'null'})`,
      );
    });
    child.on('error', (error: Error) => {
      this.markDead(`LSP server '${command}' process error: ${error.message}`);
    });
    stdin.on('error', (error: Error) => {
      this.markDead(`LSP server '${command}' stdin failed: ${error.message}`);
    });
    stdout.on('data', (chunk: Buffer | string) => {
      const bytes =
        typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      for (const message of this.decoder.feed(bytes)) {
        this.options.onMessage(message);
      }
    });
    stdout.on('error', (error: Error) => {
      this.markDead(`LSP server '${command}' stdout failed: ${error.message}`);
    });

    logger.debug(() => `Started ${command} (pid ${child.pid ?? 'unknown'})`);
  }

  /**
   * Writes one complete frame. Resolves once the stream has accepted it.
   */
  async write(frame: Buffer): Promise<void> {
    const stdin = this.child?.stdin;
    if (!this.isRunning() || !stdin) {
      throw new NotRunningError(this.exitReason);
    }

    await new Promise<void>((resolve, reject) => {
      stdin.write(frame, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Closes stdin, kills the process and waits for it to be reaped. Safe to
   * call repeatedly and before `start()`.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    this.stopping = this.terminate();
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    const child = this.child;
    this.markDead('LSP server was stopped', false);
    if (!child) {
      return;
    }

    child.stdin?.end();

    const exited = child.exitCode !== null || child.signalCode !== null;
    if (!exited) {
      const exit = once(child, 'exit');
      child.kill('SIGKILL');
      try {
        await exit;
      } catch (error) {
        logger.debug(
          () =>
            `Error while waiting for LSP server exit: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    child.stdout?.removeAllListeners('data');
    this.decoder.reset();
    logger.debug('LSP server stopped');
  }

  private markDead(reason: string, notify = true): void {
    if (this.state === 'dead' && this.exitReason !== undefined) {
      return;
    }
    this.state = 'dead';
    this.exitReason = reason;
    logger.debug(reason);
    if (notify) {
      this.options.onExit?.(reason);
    }
  }
}
