import { describe, expect, it } from 'vitest';

import { NotificationSink } from '../src/service/notification-sink.js';
import type { JsonRpcMessage } from '../src/types.js';

const note = (n: number): JsonRpcMessage => ({
  jsonrpc: '2.0',
  method: 'window/logMessage',
  params: { n },
});

describe('NotificationSink', () => {
  it('defaults to a capacity of 100', () => {
    expect(new NotificationSink().capacity).toBe(100);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new NotificationSink(0)).toThrow(RangeError);
    expect(() => new NotificationSink(2.5)).toThrow(RangeError);
  });

  it('keeps messages in arrival order', () => {
    const sink = new NotificationSink(5);
    sink.push(note(1));
    sink.push(note(2));

    expect(sink.shift()).toEqual(note(1));
    expect(sink.drain()).toEqual([note(2)]);
    expect(sink.size).toBe(0);
  });

  it('drops the oldest message once full and counts the drop', () => {
    const sink = new NotificationSink(3);
    for (let n = 1; n <= 5; n += 1) {
      sink.push(note(n));
    }

    expect(sink.size).toBe(3);
    expect(sink.dropped).toBe(2);
    expect(sink.drain()).toEqual([note(3), note(4), note(5)]);
  });

  it('hands a pushed message straight to a waiting reader', async () => {
    const sink = new NotificationSink(1);
    const pending = sink.next();
    sink.push(note(7));

    await expect(pending).resolves.toEqual(note(7));
    expect(sink.size).toBe(0);
  });

  it('resolves next() immediately when a message is queued', async () => {
    const sink = new NotificationSink();
    sink.push(note(1));

    await expect(sink.next()).resolves.toEqual(note(1));
  });

  it('stops waiting when the signal aborts', async () => {
    const sink = new NotificationSink();
    const controller = new AbortController();
    const pending = sink.next(controller.signal);
    controller.abort(new Error('gave up'));

    await expect(pending).rejects.toThrow('gave up');

    sink.push(note(2));
    expect(sink.size).toBe(1);
  });

  it('rejects waiters on close but keeps queued messages readable', async () => {
    const sink = new NotificationSink();
    const waiting = sink.next();
    sink.close(new Error('closed'));

    await expect(waiting).rejects.toThrow('closed');
    await expect(sink.next()).rejects.toThrow('closed');

    sink.push(note(3));
    await expect(sink.next()).resolves.toEqual(note(3));
  });
});
