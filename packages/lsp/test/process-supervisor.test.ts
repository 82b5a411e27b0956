import { describe, expect, it } from 'vitest';

import { encodeFrame } from '../src/codec/frame-codec.js';
import {
  LaunchError,
  NotRunningError,
  type FramingError,
} from '../src/errors.js';
import { ProcessSupervisor } from '../src/service/process-supervisor.js';
import type { JsonRpcMessage } from '../src/types.js';
import { recordSpawns } from './helpers/fake-child-process.js';

describe('ProcessSupervisor', () => {
  it('reaps a child that is stopped while it is still starting', async () => {
    const spawns = recordSpawns();
    const supervisor = new ProcessSupervisor({
      onMessage: () => {},
      spawn: spawns.spawn,
    });

    const starting = supervisor.start('fake-sqls').catch((e: unknown) => e);
    const child = spawns.children[0];
    let exited = false;
    child?.once('exit', () => {
      exited = true;
    });

    await supervisor.stop();

    expect(exited).toBe(true);
    expect(child?.killSignals).toEqual(['SIGKILL']);
    const error = await starting;
    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({
      message: "LSP server 'fake-sqls' was stopped while starting",
    });
    expect(supervisor.isRunning()).toBe(false);
  });

  it('does not kill a child whose spawn failed', async () => {
    const spawns = recordSpawns(new Error('spawn fake-sqls EACCES'));
    const supervisor = new ProcessSupervisor({
      onMessage: () => {},
      spawn: spawns.spawn,
    });

    await expect(supervisor.start('fake-sqls')).rejects.toBeInstanceOf(
      LaunchError,
    );
    await supervisor.stop();

    expect(spawns.children[0]?.killSignals).toEqual([]);
  });

  it('passes decoded messages and framing errors to its callbacks', async () => {
    const spawns = recordSpawns();
    const messages: JsonRpcMessage[] = [];
    const framingErrors: FramingError[] = [];
    const supervisor = new ProcessSupervisor({
      onMessage: (message) => messages.push(message),
      onFramingError: (error) => framingErrors.push(error),
      spawn: spawns.spawn,
    });
    await supervisor.start('fake-sqls');

    const child = spawns.children[0];
    child?.sendRaw('Content-Length: 4\r\n\r\nnope');
    child?.sendRaw(encodeFrame({ jsonrpc: '2.0', method: 'sqls/ready' }));
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(framingErrors.map((error) => error.raw)).toEqual(['nope']);
    expect(messages).toEqual([{ jsonrpc: '2.0', method: 'sqls/ready' }]);
    await supervisor.stop();
  });

  it('reports an unexpected exit once and refuses further writes', async () => {
    const spawns = recordSpawns();
    const reasons: string[] = [];
    const supervisor = new ProcessSupervisor({
      onMessage: () => {},
      onExit: (reason) => reasons.push(reason),
      spawn: spawns.spawn,
    });
    await supervisor.start('fake-sqls', ['-config', 'db.yml']);

    spawns.children[0]?.crash(1);
    spawns.children[0]?.emit('error', new Error('late error'));

    expect(reasons).toEqual([
      "LSP server 'fake-sqls' exited (code=1, signal=null)",
    ]);
    await expect(
      supervisor.write(encodeFrame({ jsonrpc: '2.0', method: 'x' })),
    ).rejects.toThrow("LSP server 'fake-sqls' exited (code=1, signal=null)");
    await expect(
      supervisor.write(encodeFrame({ jsonrpc: '2.0', method: 'x' })),
    ).rejects.toBeInstanceOf(NotRunningError);
    await supervisor.stop();
  });

  it('refuses to start twice', async () => {
    const spawns = recordSpawns();
    const supervisor = new ProcessSupervisor({
      onMessage: () => {},
      spawn: spawns.spawn,
    });
    await supervisor.start('fake-sqls');

    await expect(supervisor.start('fake-sqls')).rejects.toThrow(
      "Cannot start 'fake-sqls': process supervisor already used",
    );
    expect(spawns.calls).toHaveLength(1);
    await supervisor.stop();
  });
});
