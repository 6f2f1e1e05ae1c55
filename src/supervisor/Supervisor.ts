import { getLoggerFor } from 'global-logger-factory';
import type { DependencyGraph } from './DependencyGraph';
import { DependencyBlockedError, StartFailure } from './errors';
import type { HealthProbe } from './HealthProbe';
import { ServiceUnit } from './ServiceUnit';
import type {
  ProcessHandle,
  TransitionEvent,
  TransitionListener,
  UnitLauncher,
  UnitSnapshot,
} from './types';

/** Exit code recorded when the launcher could not start the process. */
export const START_FAILURE_EXIT_CODE = 127;

export type BlockedListener = (error: DependencyBlockedError) => void;

export interface SupervisorOptions {
  launcher: UnitLauncher;
  probe: HealthProbe;
  /** Delay between a restartable exit and re-evaluating the unit's prerequisites. */
  restartDelayMs?: number;
  /** How long to wait for a killed unit to exit during shutdown. */
  stopTimeoutMs?: number;
}

/**
 * Starts units in dependency order, gates each one on the health of its direct
 * prerequisites, polls health, applies restart policies and stops everything
 * in reverse order on shutdown.
 */
export class Supervisor {
  private readonly logger = getLoggerFor(this);
  private readonly launcher: UnitLauncher;
  private readonly probe: HealthProbe;
  private readonly restartDelayMs: number;
  private readonly stopTimeoutMs: number;
  private readonly units: Map<string, ServiceUnit> = new Map();
  private readonly transitionListeners: Set<TransitionListener> = new Set();
  private readonly blockedListeners: Set<BlockedListener> = new Set();
  private readonly abortController = new AbortController();
  private graph?: DependencyGraph;
  private shuttingDown = false;
  private stopping?: Promise<void>;
  private resolveRun?: () => void;

  public constructor(options: SupervisorOptions) {
    this.launcher = options.launcher;
    this.probe = options.probe;
    this.restartDelayMs = options.restartDelayMs ?? 1_000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10_000;
  }

  public onTransition(listener: TransitionListener): () => void {
    this.transitionListeners.add(listener);
    return () => this.transitionListeners.delete(listener);
  }

  public onBlocked(listener: BlockedListener): () => void {
    this.blockedListeners.add(listener);
    return () => this.blockedListeners.delete(listener);
  }

  /**
   * Runs the stack until `shutdown()` has stopped every unit.
   */
  public async run(graph: DependencyGraph): Promise<void> {
    if (this.graph) {
      throw new Error('Supervisor is already running a graph');
    }
    if (this.shuttingDown) {
      return;
    }
    graph.freeze();
    this.graph = graph;
    for (const name of graph.names()) {
      this.units.set(name, new ServiceUnit(graph.get(name)));
    }

    const finished = new Promise<void>((resolve) => {
      this.resolveRun = resolve;
    });

    this.logger.info(`Supervising ${graph.size} unit(s)`);
    for (const batch of graph.topologicalBatches()) {
      await this.evaluateAll([ ...batch ]);
    }
    await finished;
  }

  public shutdown(): Promise<void> {
    if (!this.stopping) {
      this.shuttingDown = true;
      this.abortController.abort();
      this.logger.info('Shutting down, stopping units in reverse dependency order');
      this.stopping = this.stopAll().finally(() => this.resolveRun?.());
    }
    return this.stopping;
  }

  public isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public getState(name: string): UnitSnapshot | undefined {
    return this.units.get(name)?.snapshot();
  }

  public getAllStates(): UnitSnapshot[] {
    return Array.from(this.units.values()).map((unit) => unit.snapshot());
  }

  /**
   * Decides whether a pending unit can start now, must keep waiting, or can never start.
   */
  private async evaluate(name: string): Promise<void> {
    const unit = this.requireUnit(name);
    const prerequisites = [ ...this.requireGraph().prerequisitesOf(name) ].map((prerequisite) => this.requireUnit(prerequisite));

    const followUps = await unit.runExclusive(async (): Promise<string[]> => {
      const next: string[] = [];
      if (this.shuttingDown || unit.status !== 'pending') {
        return next;
      }

      const blocker = prerequisites.find((prerequisite) =>
        prerequisite.status === 'blocked' || prerequisite.status === 'terminated');
      if (blocker) {
        const reason = blocker.status === 'blocked' ?
          `prerequisite "${blocker.name}" is blocked` :
          `prerequisite "${blocker.name}" terminated and will not restart`;
        this.block(unit, reason, blocker.status === 'terminated', next);
        return next;
      }

      if (unit.restartTimer || prerequisites.some((prerequisite) => prerequisite.status !== 'healthy')) {
        return next;
      }

      await this.start(unit, next);
      return next;
    });

    await this.evaluateAll(followUps);
  }

  private async evaluateAll(names: string[]): Promise<void> {
    await Promise.all([ ...new Set(names) ].map(async (name) => this.evaluate(name)));
  }

  /**
   * Must be called while holding the unit's lock.
   */
  private async start(unit: ServiceUnit, followUps: string[]): Promise<void> {
    this.emit(unit.transition('starting'));
    const generation = unit.beginRun();

    let handle: ProcessHandle;
    try {
      handle = await this.launcher.start(unit.config);
    } catch (error: unknown) {
      const failure = error instanceof StartFailure ? error : new StartFailure(unit.name, error);
      this.logger.error(failure.message);
      this.afterExit(unit, START_FAILURE_EXIT_CODE, followUps);
      return;
    }

    unit.handle = handle;
    this.logger.info(`Started ${unit.name}${handle.pid === undefined ? '' : ` (pid ${handle.pid})`}`);
    this.watchExit(unit, handle, generation);

    const { healthcheck } = unit.config;
    if (!healthcheck) {
      this.emit(unit.markHealthy());
      followUps.push(...this.requireGraph().dependentsOf(unit.name));
      return;
    }

    this.schedulePoll(unit, generation);
  }

  private watchExit(unit: ServiceUnit, handle: ProcessHandle, generation: number): void {
    void handle.wait().then(
      async (exitCode) => this.handleExit(unit, generation, exitCode),
      async (error: unknown) => {
        this.logger.error(`Lost track of ${unit.name}: ${errorMessage(error)}`);
        return this.handleExit(unit, generation, 1);
      },
    ).catch((error: unknown) => {
      this.logger.error(`Exit handling for ${unit.name} failed: ${errorMessage(error)}`);
    });
  }

  private async handleExit(unit: ServiceUnit, generation: number, exitCode: number): Promise<void> {
    const followUps = await unit.runExclusive((): string[] => {
      const next: string[] = [];
      if (unit.generation === generation) {
        this.afterExit(unit, exitCode, next);
      }
      return next;
    });
    await this.evaluateAll(followUps);
  }

  /**
   * Must be called while holding the unit's lock.
   */
  private afterExit(unit: ServiceUnit, exitCode: number, followUps: string[]): void {
    const wasBlocked = unit.status === 'blocked';
    this.emit(unit.recordExit(exitCode));
    if (exitCode === 0) {
      this.logger.info(`${unit.name} exited with code 0`);
    } else {
      this.logger.warn(`${unit.name} exited with code ${exitCode}`);
    }
    if (wasBlocked || this.shuttingDown) {
      return;
    }

    if (unit.shouldRestart(exitCode)) {
      unit.restartCount += 1;
      this.emit(unit.transition('pending'));
      this.logger.info(`Restarting ${unit.name} once its prerequisites are healthy (restart #${unit.restartCount})`);
      unit.restartTimer = setTimeout(() => {
        unit.restartTimer = undefined;
        void this.evaluate(unit.name).catch((error: unknown) => {
          this.logger.error(`Restart of ${unit.name} failed: ${errorMessage(error)}`);
        });
      }, this.restartDelayMs);
      return;
    }

    // Dependents still waiting on this unit can no longer start.
    followUps.push(...this.requireGraph().dependentsOf(unit.name));
  }

  private schedulePoll(unit: ServiceUnit, generation: number): void {
    const interval = unit.config.healthcheck?.intervalMs;
    if (interval === undefined) {
      return;
    }
    unit.pollTimer = setTimeout(() => {
      unit.pollTimer = undefined;
      void this.pollOnce(unit, generation).catch((error: unknown) => {
        this.logger.error(`Polling ${unit.name} failed: ${errorMessage(error)}`);
      });
    }, interval);
  }

  private async pollOnce(unit: ServiceUnit, generation: number): Promise<void> {
    const { healthcheck } = unit.config;
    const { startedAt } = unit;
    if (this.isStale(unit, generation) || !healthcheck || startedAt === undefined) {
      return;
    }

    // The probe is the only suspending step and runs outside the unit's lock.
    const result = await this.probe.poll({ name: unit.name, healthcheck, startedAt }, this.abortController.signal);

    const followUps = await unit.runExclusive((): string[] => {
      const next: string[] = [];
      if (this.isStale(unit, generation)) {
        return next;
      }
      if (result) {
        const event = unit.recordProbe(result);
        this.emit(event);
        if (event?.to === 'healthy') {
          next.push(...this.requireGraph().dependentsOf(unit.name));
        }
        // Only a check that completes past the start window without success blocks the unit.
        const windowMs = healthcheck.startPeriodMs + healthcheck.retries * healthcheck.intervalMs;
        if (!unit.healthyThisRun && Date.now() - startedAt >= windowMs) {
          this.block(unit, `not healthy within ${windowMs}ms of starting`, true, next);
          return next;
        }
      }
      this.schedulePoll(unit, generation);
      return next;
    });
    await this.evaluateAll(followUps);
  }

  /**
   * Must be called while holding the unit's lock. Only root causes are
   * reported; units blocked behind an already blocked prerequisite are
   * listed in the root's report instead.
   */
  private block(unit: ServiceUnit, reason: string, report: boolean, followUps: string[]): void {
    const graph = this.requireGraph();
    this.emit(unit.block(reason));
    followUps.push(...graph.dependentsOf(unit.name));
    if (!report) {
      this.logger.warn(`${unit.name} is blocked: ${reason}`);
      return;
    }

    const dependents = graph.transitiveDependentsOf(unit.name)
      .filter((name) => this.requireUnit(name).status === 'pending');
    const error = new DependencyBlockedError(unit.name, reason, dependents);
    this.logger.error(error.message);
    for (const listener of this.blockedListeners) {
      try {
        listener(error);
      } catch (listenerError: unknown) {
        this.logger.error(`Blocked listener failed: ${errorMessage(listenerError)}`);
      }
    }
  }

  private isStale(unit: ServiceUnit, generation: number): boolean {
    return this.shuttingDown || unit.generation !== generation || !unit.isRunning();
  }

  private emit(event?: TransitionEvent): void {
    if (!event) {
      return;
    }
    this.logger.info(`${event.unit}: ${event.from} -> ${event.to}`);
    for (const listener of this.transitionListeners) {
      try {
        listener(event);
      } catch (error: unknown) {
        this.logger.error(`Transition listener failed: ${errorMessage(error)}`);
      }
    }
  }

  private async stopAll(): Promise<void> {
    for (const unit of this.units.values()) {
      unit.clearTimers();
    }
    const batches = this.graph ? [ ...this.graph.topologicalBatches() ].reverse() : [];
    for (const batch of batches) {
      await Promise.all([ ...batch ].map(async (name) => this.stopUnit(this.requireUnit(name))));
    }
    this.logger.info('All units stopped');
  }

  private async stopUnit(unit: ServiceUnit): Promise<void> {
    const handle = await unit.runExclusive((): ProcessHandle | undefined => {
      unit.clearTimers();
      return unit.handle;
    });
    if (!handle) {
      return;
    }

    this.logger.info(`Stopping ${unit.name}`);
    try {
      await handle.kill();
    } catch (error: unknown) {
      this.logger.error(`Failed to stop ${unit.name}: ${errorMessage(error)}`);
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(`${unit.name} did not exit within ${this.stopTimeoutMs}ms`);
        resolve();
      }, this.stopTimeoutMs);
    });
    const exited = handle.wait().then(() => undefined, (error: unknown) => {
      this.logger.warn(`Waiting for ${unit.name} to exit failed: ${errorMessage(error)}`);
    });
    try {
      await Promise.race([ exited, timeout ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private requireUnit(name: string): ServiceUnit {
    const unit = this.units.get(name);
    if (!unit) {
      throw new Error(`Unit "${name}" is not supervised`);
    }
    return unit;
  }

  private requireGraph(): DependencyGraph {
    if (!this.graph) {
      throw new Error('Supervisor is not running');
    }
    return this.graph;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
