import { logContext } from '../logging/LogContext';
import type {
  ProbeResult,
  ProcessHandle,
  TransitionEvent,
  UnitConfig,
  UnitSnapshot,
  UnitStatus,
} from './types';

const TRANSITIONS: Record<UnitStatus, readonly UnitStatus[]> = {
  pending: [ 'starting', 'blocked' ],
  starting: [ 'healthy', 'unhealthy', 'terminated', 'blocked' ],
  healthy: [ 'unhealthy', 'terminated' ],
  unhealthy: [ 'healthy', 'terminated', 'blocked' ],
  terminated: [ 'pending' ],
  blocked: [],
};

const RUNNING: readonly UnitStatus[] = [ 'starting', 'healthy', 'unhealthy' ];

export class IllegalTransitionError extends Error {
  public constructor(unit: string, from: UnitStatus, to: UnitStatus) {
    super(`Unit "${unit}" cannot go from ${from} to ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * One supervised service: its configuration plus the mutable run state the
 * Supervisor drives. All mutation is expected to happen inside `runExclusive`.
 */
export class ServiceUnit {
  public readonly name: string;
  private statusValue: UnitStatus = 'pending';
  private queue: Promise<void> = Promise.resolve();

  public handle?: ProcessHandle;
  public startedAt?: number;
  /** Bumped on every start so callbacks from an older run can be told apart. */
  public generation = 0;
  public consecutiveFailures = 0;
  public healthyThisRun = false;
  public restartCount = 0;
  public lastExitCode?: number;
  public blockedReason?: string;

  public pollTimer?: NodeJS.Timeout;
  public restartTimer?: NodeJS.Timeout;

  public constructor(public readonly config: UnitConfig) {
    this.name = config.name;
  }

  public get status(): UnitStatus {
    return this.statusValue;
  }

  public isRunning(): boolean {
    return RUNNING.includes(this.statusValue);
  }

  /**
   * Serializes work on this unit. Other units are never locked from inside the task.
   */
  public runExclusive<R>(task: () => R | Promise<R>): Promise<R> {
    const run = this.queue.then(async (): Promise<R> => logContext.run({ unit: this.name }, task));
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Moves to `to` and returns the event, or `undefined` when already there.
   */
  public transition(to: UnitStatus): TransitionEvent | undefined {
    const from = this.statusValue;
    if (from === to) {
      return undefined;
    }
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(this.name, from, to);
    }
    this.statusValue = to;
    return { unit: this.name, from, to, at: new Date() };
  }

  public beginRun(): number {
    this.generation += 1;
    this.startedAt = Date.now();
    this.consecutiveFailures = 0;
    this.healthyThisRun = false;
    return this.generation;
  }

  /**
   * Applies a probe verdict: one success is enough to become healthy,
   * `retries` consecutive failures make a running unit unhealthy.
   */
  public recordProbe(result: ProbeResult): TransitionEvent | undefined {
    if (!this.isRunning()) {
      return undefined;
    }
    if (result.success) {
      this.consecutiveFailures = 0;
      this.healthyThisRun = true;
      return this.transition('healthy');
    }
    this.consecutiveFailures += 1;
    const retries = this.config.healthcheck?.retries ?? 1;
    if (this.consecutiveFailures >= retries && this.statusValue !== 'unhealthy') {
      return this.transition('unhealthy');
    }
    return undefined;
  }

  public markHealthy(): TransitionEvent | undefined {
    this.healthyThisRun = true;
    return this.transition('healthy');
  }

  public recordExit(exitCode: number): TransitionEvent | undefined {
    this.clearTimers();
    this.handle = undefined;
    this.lastExitCode = exitCode;
    if (this.statusValue === 'blocked') {
      return undefined;
    }
    return this.transition('terminated');
  }

  public shouldRestart(exitCode: number): boolean {
    switch (this.config.restart) {
      case 'always': return true;
      case 'on-failure': return exitCode !== 0;
      default: return false;
    }
  }

  public block(reason: string): TransitionEvent | undefined {
    this.clearTimers();
    this.blockedReason = reason;
    return this.transition('blocked');
  }

  public clearTimers(): void {
    clearTimeout(this.pollTimer);
    clearTimeout(this.restartTimer);
    this.pollTimer = undefined;
    this.restartTimer = undefined;
  }

  public snapshot(): UnitSnapshot {
    return {
      name: this.name,
      status: this.statusValue,
      pid: this.handle?.pid,
      startedAt: this.startedAt,
      uptimeMs: this.isRunning() && this.startedAt !== undefined ? Date.now() - this.startedAt : undefined,
      restartCount: this.restartCount,
      lastExitCode: this.lastExitCode,
      consecutiveFailures: this.consecutiveFailures,
      blockedReason: this.blockedReason,
    };
  }
}
