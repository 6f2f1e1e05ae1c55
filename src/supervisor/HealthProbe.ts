import { getLoggerFor } from 'global-logger-factory';
import { ProbeTimeoutError } from './errors';
import type { CheckRunner, HealthCheckSpec, ProbeResult } from './types';

export interface ProbeTarget {
  name: string;
  healthcheck: HealthCheckSpec;
  /** Epoch millis of the current run's start. */
  startedAt: number;
}

/**
 * Runs one health check against a started unit.
 * Purely observational: the caller decides what a result means for the unit.
 */
export class HealthProbe {
  private readonly logger = getLoggerFor(this);

  public constructor(private readonly runner: CheckRunner) {}

  /**
   * Resolves `undefined` while the unit is still inside its start period:
   * such polls are not due and must not count as failures.
   */
  public async poll(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult | undefined> {
    const { healthcheck } = target;
    if (Date.now() - target.startedAt < healthcheck.startPeriodMs) {
      return undefined;
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ProbeResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          success: false,
          observedAt: new Date(),
          elapsedMs: Date.now() - started,
          error: new ProbeTimeoutError(target.name, healthcheck.timeoutMs),
        });
      }, healthcheck.timeoutMs);
    });

    const check = this.runner.runCheck(healthcheck.test, controller.signal).then(
      (outcome): ProbeResult => {
        let error: Error | undefined;
        if (outcome.elapsedMs > healthcheck.timeoutMs) {
          error = new ProbeTimeoutError(target.name, healthcheck.timeoutMs);
        } else if (outcome.exitCode !== 0) {
          error = new Error(`Health check exited with code ${outcome.exitCode}`);
        }
        return { success: !error, observedAt: new Date(), elapsedMs: outcome.elapsedMs, error };
      },
      (error: unknown): ProbeResult => ({
        success: false,
        observedAt: new Date(),
        elapsedMs: Date.now() - started,
        error: error instanceof Error ? error : new Error(String(error)),
      }),
    );

    try {
      const result = await Promise.race([ check, timeout ]);
      if (result.error instanceof ProbeTimeoutError) {
        this.logger.warn(result.error.message);
      } else if (!result.success) {
        this.logger.debug(`Health check of ${target.name} failed: ${result.error?.message ?? 'unknown error'}`);
      }
      return result;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
