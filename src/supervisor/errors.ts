/**
 * Adding the edge would close a dependency cycle.
 */
export class CycleError extends Error {
  public constructor(public readonly cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
  }
}

export class UnknownUnitError extends Error {
  public constructor(public readonly unit: string, context?: string) {
    super(context ? `Unknown unit "${unit}" referenced by ${context}` : `Unknown unit "${unit}"`);
    this.name = 'UnknownUnitError';
  }
}

export class DuplicateUnitError extends Error {
  public constructor(public readonly unit: string) {
    super(`Unit "${unit}" is declared more than once`);
    this.name = 'DuplicateUnitError';
  }
}

/**
 * The stack file could not be read or does not describe a valid stack.
 */
export class ConfigError extends Error {
  public constructor(message: string, public readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class ProbeTimeoutError extends Error {
  public constructor(public readonly unit: string, public readonly timeoutMs: number) {
    super(`Health check of "${unit}" did not complete within ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * The launcher could not bring the process up at all.
 */
export class StartFailure extends Error {
  public constructor(public readonly unit: string, cause: unknown) {
    super(`Failed to start "${unit}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StartFailure';
  }
}

/**
 * A unit will never start because it, or a prerequisite it waits on, can no longer become healthy.
 */
export class DependencyBlockedError extends Error {
  public constructor(
    public readonly unit: string,
    public readonly reason: string,
    public readonly dependents: string[],
  ) {
    super(dependents.length > 0 ?
      `Unit "${unit}" is blocked (${reason}); dependents blocked: ${dependents.join(', ')}` :
      `Unit "${unit}" is blocked (${reason})`);
    this.name = 'DependencyBlockedError';
  }
}
