import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CommandCheckRunner } from '../../src/runtime/CommandCheckRunner';
import { toExitCode } from '../../src/runtime/process';
import { MockChildProcess, spawnReturning, type SpawnCall } from './MockChildProcess';

describe('CommandCheckRunner', () => {
  let calls: SpawnCall[];
  let child: MockChildProcess;
  let runner: CommandCheckRunner;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    calls = [];
    child = new MockChildProcess();
    runner = new CommandCheckRunner({ processFactory: spawnReturning(child, calls), shell: '/bin/bash', env: { PATH: '/bin' }});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs shell checks through the configured shell', async () => {
    const outcome = runner.runCheck({ type: 'shell', script: 'redis-cli ping' }, new AbortController().signal);
    vi.setSystemTime(250);
    child.emit('exit', 0, null);

    await expect(outcome).resolves.toEqual({ exitCode: 0, elapsedMs: 250 });
    expect(calls[0].command).toBe('/bin/bash');
    expect(calls[0].args).toEqual([ '-c', 'redis-cli ping' ]);
    expect(calls[0].options).toEqual({ stdio: 'ignore', env: { PATH: '/bin' }});
  });

  it('runs exec checks directly', async () => {
    const outcome = runner.runCheck({ type: 'exec', argv: [ 'curl', '-f', 'http://localhost/health' ]}, new AbortController().signal);
    child.emit('exit', 22, null);

    await expect(outcome).resolves.toEqual({ exitCode: 22, elapsedMs: 0 });
    expect(calls[0].command).toBe('curl');
    expect(calls[0].args).toEqual([ '-f', 'http://localhost/health' ]);
  });

  it('kills the check when the signal aborts', async () => {
    const controller = new AbortController();
    const outcome = runner.runCheck({ type: 'shell', script: 'sleep 60' }, controller.signal);
    controller.abort();

    await expect(outcome).resolves.toEqual({ exitCode: 137, elapsedMs: 0 });
    expect(child.signals).toEqual([ 'SIGKILL' ]);
  });

  it('refuses to start with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runner.runCheck({ type: 'shell', script: 'true' }, controller.signal)).rejects
      .toThrow('Health check aborted before it started');
    expect(calls).toEqual([]);
  });

  it('rejects an empty exec command', async () => {
    await expect(runner.runCheck({ type: 'exec', argv: []}, new AbortController().signal)).rejects
      .toThrow('Health check has no command');
  });

  it('rejects when the check cannot be spawned', async () => {
    const failing = new CommandCheckRunner({ processFactory: spawnReturning(new MockChildProcess(), [], 'error') });
    await expect(failing.runCheck({ type: 'exec', argv: [ 'missing-binary' ]}, new AbortController().signal)).rejects
      .toThrow('spawn missing-binary ENOENT');
  });
});

describe('toExitCode', () => {
  it('prefers the exit code', () => {
    expect(toExitCode(0, null)).toBe(0);
    expect(toExitCode(2, 'SIGTERM')).toBe(2);
  });

  it('maps signals to 128 plus their number', () => {
    expect(toExitCode(null, 'SIGTERM')).toBe(143);
    expect(toExitCode(null, 'SIGINT')).toBe(130);
  });

  it('falls back to 1', () => {
    expect(toExitCode(null, null)).toBe(1);
  });
});
