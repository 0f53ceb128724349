import { beforeEach, describe, expect, it, vi } from 'vitest';

import BlinkAuth from '../blink-auth';
import CommandPoller, { classifyStatus, pollUntil } from '../command-poller';
import { resolveOptions } from '../config';
import FakeBlinkServer, {
  commandStatus,
  NETWORK_ID,
  savedSession,
  testOptions
} from './helpers/fake-blink-server';

const budget = { intervalMs: 0, maxAttempts: 5, timeoutMs: null };

describe('pollUntil', () => {
  it('makes N + 1 calls when the first N report pending', async () => {
    let calls = 0;
    const check = vi.fn(async () => {
      calls++;
      return { done: calls === 4, value: calls };
    });

    const result = await pollUntil(check, budget);

    expect(result).toEqual({ done: true, value: 4, attempts: 4 });
    expect(check).toHaveBeenCalledTimes(4);
  });

  it('stops after exactly maxAttempts calls', async () => {
    const check = vi.fn(async () => ({ done: false, value: 'pending' }));

    const result = await pollUntil(check, budget);

    expect(result).toEqual({ done: false, value: 'pending', attempts: 5 });
    expect(check).toHaveBeenCalledTimes(5);
  });

  it('stops when the time budget cannot cover another wait', async () => {
    const check = vi.fn(async () => ({ done: false, value: null }));

    const result = await pollUntil(check, { intervalMs: 0, maxAttempts: 5, timeoutMs: 0 });

    expect(result.attempts).toBe(1);
    expect(check).toHaveBeenCalledTimes(1);
  });
});

describe('classifyStatus', () => {
  it('treats a non-OK status code as failure', () => {
    expect(classifyStatus({ complete: false, status_code: 400 })).toBe('failed');
  });

  it('reads the completion flag', () => {
    expect(classifyStatus({ complete: true, status_code: 908 })).toBe('completed');
    expect(classifyStatus({ complete: false, status_code: 908 })).toBe('pending');
  });

  it('reports a response without completion flag as unknown', () => {
    expect(classifyStatus({ status_msg: 'working' })).toBe('unknown');
  });
});

describe('CommandPoller', () => {
  let server: FakeBlinkServer;
  let poller: CommandPoller;

  const start = async (maxAttempts = 10) => {
    const auth = new BlinkAuth(
      savedSession,
      resolveOptions(testOptions(server, { commandPoll: { maxAttempts } }))
    );
    await auth.startup();
    poller = new CommandPoller(auth);
  };

  const command = { id: 77, networkId: NETWORK_ID, kind: 'arm' as const, complete: false };

  beforeEach(() => {
    server = new FakeBlinkServer();
  });

  it('polls until the command completes', async () => {
    await start();
    server.on(
      commandStatus(77),
      { data: { complete: false, status_code: 908 } },
      { data: { complete: false, status_code: 908 } },
      { data: { complete: true, status_code: 908 } }
    );

    const result = await poller.wait(command);

    expect(result.outcome).toBe('completed');
    expect(result.attempts).toBe(3);
    expect(result.command.complete).toBe(true);
    expect(server.count(commandStatus(77))).toBe(3);
  });

  it('times out after the attempt budget with the last state', async () => {
    await start(4);
    server.on(commandStatus(77), { data: { complete: false, status_code: 908 } });

    const result = await poller.wait(command);

    expect(result.outcome).toBe('timed_out');
    expect(result.lastState).toBe('pending');
    expect(result.command.complete).toBe(false);
    expect(server.count(commandStatus(77))).toBe(4);
  });

  it('reports a failure status code at once', async () => {
    await start();
    server.on(commandStatus(77), { data: { complete: false, status_code: 400, status_msg: 'no' } });

    const result = await poller.wait(command);

    expect(result.outcome).toBe('failed');
    expect(result.attempts).toBe(1);
    expect(result.status).toEqual({ complete: false, status_code: 400, status_msg: 'no' });
  });

  it('keeps polling through status responses without a completion flag', async () => {
    await start(3);
    server.on(commandStatus(77), { data: { status_msg: 'working' } });

    const result = await poller.wait(command);

    expect(result.outcome).toBe('timed_out');
    expect(result.lastState).toBe('unknown');
    expect(server.count(commandStatus(77))).toBe(3);
  });

  it('has nothing to wait for when the response carries no command id', async () => {
    await start();

    const result = await poller.run('thumbnail', async () => ({ network_id: NETWORK_ID }));

    expect(result).toBeNull();
    expect(server.calls).toHaveLength(0);
  });
});
