import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProbeTimeoutError } from '../../src/supervisor/errors';
import { HealthProbe } from '../../src/supervisor/HealthProbe';
import type { CheckRunner } from '../../src/supervisor/types';
import { check, ScriptedCheckRunner } from './fakes';

describe('HealthProbe', () => {
  let runner: ScriptedCheckRunner;
  let probe: HealthProbe;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    runner = new ScriptedCheckRunner();
    probe = new HealthProbe(runner);
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it('reports success when the check exits with code 0', async () => {
    runner.set('ping', 0);
    const result = await probe.poll({ name: 'cache', healthcheck: check('ping'), startedAt: 0 });
    expect(result?.success).toBe(true);
    expect(result?.error).toBeUndefined();
    expect(result?.observedAt.getTime()).toBe(0);
  });

  it('reports failure for a non-zero exit code', async () => {
    runner.set('ping', 2);
    const result = await probe.poll({ name: 'cache', healthcheck: check('ping'), startedAt: 0 });
    expect(result?.success).toBe(false);
    expect(result?.error?.message).toBe('Health check exited with code 2');
  });

  it('does not run the check before the start period has elapsed', async () => {
    runner.set('ping', 0);
    vi.setSystemTime(9_999);
    const target = { name: 'store', healthcheck: check('ping', { startPeriodMs: 10_000 }), startedAt: 0 };

    expect(await probe.poll(target)).toBeUndefined();
    expect(runner.calls).toHaveLength(0);

    vi.setSystemTime(10_000);
    expect((await probe.poll(target))?.success).toBe(true);
    expect(runner.calls).toHaveLength(1);
  });

  it('fails the probe and aborts the check when it exceeds the timeout', async () => {
    let seen: AbortSignal | undefined;
    runner.set('slow', (signal) => {
      seen = signal;
      return new Promise<number>(() => undefined);
    });

    const pending = probe.poll({ name: 'app', healthcheck: check('slow', { timeoutMs: 5_000 }), startedAt: 0 });
    await vi.advanceTimersByTimeAsync(5_000);
    const result = await pending;

    expect(result?.success).toBe(false);
    expect(result?.error).toBeInstanceOf(ProbeTimeoutError);
    expect(result?.error?.message).toBe('Health check of "app" did not complete within 5000ms');
    expect(seen?.aborted).toBe(true);
  });

  it('treats a check that reports more time than the timeout as failed', async () => {
    const lateRunner: CheckRunner = { runCheck: async () => ({ exitCode: 0, elapsedMs: 1_500 }) };
    const result = await new HealthProbe(lateRunner).poll({ name: 'app', healthcheck: check('x'), startedAt: 0 });
    expect(result?.success).toBe(false);
    expect(result?.error).toBeInstanceOf(ProbeTimeoutError);
  });

  it('counts a runner error as a failed probe', async () => {
    runner.set('broken', () => Promise.reject(new Error('spawn /bin/sh ENOENT')));
    const result = await probe.poll({ name: 'app', healthcheck: check('broken'), startedAt: 0 });
    expect(result?.success).toBe(false);
    expect(result?.error?.message).toBe('spawn /bin/sh ENOENT');
  });

  it('cancels the in-flight check when the outer signal aborts', async () => {
    const outer = new AbortController();
    runner.set('slow', (signal) => new Promise<number>((resolve) => {
      signal.addEventListener('abort', () => resolve(137));
    }));

    const pending = probe.poll({ name: 'app', healthcheck: check('slow', { timeoutMs: 30_000 }), startedAt: 0 }, outer.signal);
    await vi.advanceTimersByTimeAsync(10);
    outer.abort();
    const result = await pending;

    expect(runner.calls[0].signal.aborted).toBe(true);
    expect(result?.success).toBe(false);
    expect(result?.error?.message).toBe('Health check exited with code 137');
  });
});
