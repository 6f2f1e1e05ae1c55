export type RestartPolicy = 'never' | 'on-failure' | 'always';

export type UnitStatus = 'pending' | 'starting' | 'healthy' | 'unhealthy' | 'terminated' | 'blocked';

/**
 * Health check command: `shell` runs through `/bin/sh -c`, `exec` runs argv directly.
 */
export type CheckCommand =
  | { type: 'shell'; script: string }
  | { type: 'exec'; argv: string[] };

export interface HealthCheckSpec {
  test: CheckCommand;
  intervalMs: number;
  timeoutMs: number;
  retries: number;
  startPeriodMs: number;
}

/**
 * How to launch a unit. Only the launcher reads it.
 */
export interface StartSpec {
  command: string[];
  environment: Record<string, string>;
  workingDir?: string;
}

export interface UnitConfig {
  name: string;
  start: StartSpec;
  dependsOn: string[];
  restart: RestartPolicy;
  healthcheck?: HealthCheckSpec;
}

export interface ProbeResult {
  success: boolean;
  observedAt: Date;
  elapsedMs: number;
  error?: Error;
}

export interface ProcessHandle {
  pid?: number;
  /** Resolves with the exit code once the process is gone. */
  wait(): Promise<number>;
  kill(): Promise<void>;
}

export interface UnitLauncher {
  start(config: UnitConfig): Promise<ProcessHandle>;
}

export interface CheckOutcome {
  exitCode: number;
  elapsedMs: number;
}

export interface CheckRunner {
  runCheck(command: CheckCommand, signal: AbortSignal): Promise<CheckOutcome>;
}

export interface TransitionEvent {
  unit: string;
  from: UnitStatus;
  to: UnitStatus;
  at: Date;
}

export interface UnitSnapshot {
  name: string;
  status: UnitStatus;
  pid?: number;
  startedAt?: number;
  uptimeMs?: number;
  restartCount: number;
  lastExitCode?: number;
  consecutiveFailures: number;
  blockedReason?: string;
}

export type TransitionListener = (event: TransitionEvent) => void;
