import { CycleError, DuplicateUnitError, UnknownUnitError } from './errors';
import type { UnitConfig } from './types';

/**
 * Directed acyclic graph of "must be healthy before" edges.
 * Each node carries a payload, typically the unit's configuration.
 */
export class DependencyGraph<T = UnitConfig> {
  private readonly nodes: Map<string, { value: T }> = new Map();
  private readonly prerequisites: Map<string, Set<string>> = new Map();
  private readonly dependents: Map<string, Set<string>> = new Map();
  private frozen = false;

  public static fromUnits(units: UnitConfig[]): DependencyGraph {
    const graph = new DependencyGraph();
    for (const unit of units) {
      graph.addUnit(unit.name, unit);
    }
    for (const unit of units) {
      for (const prerequisite of unit.dependsOn) {
        if (!graph.has(prerequisite)) {
          throw new UnknownUnitError(prerequisite, `"${unit.name}"`);
        }
        graph.addEdge(unit.name, prerequisite);
      }
    }
    return graph;
  }

  public addUnit(name: string, value: T): void {
    this.assertMutable();
    if (this.nodes.has(name)) {
      throw new DuplicateUnitError(name);
    }
    this.nodes.set(name, { value });
    this.prerequisites.set(name, new Set());
    this.dependents.set(name, new Set());
  }

  public addEdge(dependent: string, prerequisite: string): void {
    this.assertMutable();
    const required = this.requirePrerequisites(dependent);
    this.requirePrerequisites(prerequisite);
    if (required.has(prerequisite)) {
      return;
    }

    const path = this.findPath(prerequisite, dependent);
    if (path) {
      throw new CycleError([ dependent, ...path ]);
    }

    required.add(prerequisite);
    this.dependents.get(prerequisite)?.add(dependent);
  }

  /**
   * Lazily yields start batches. Batch 0 holds units without prerequisites;
   * every later unit only depends on units in strictly earlier batches.
   */
  public *topologicalBatches(): Generator<ReadonlySet<string>> {
    const remaining = new Map<string, number>();
    for (const [ name, required ] of this.prerequisites) {
      remaining.set(name, required.size);
    }

    let batch = new Set<string>();
    for (const [ name, count ] of remaining) {
      if (count === 0) {
        batch.add(name);
      }
    }

    while (batch.size > 0) {
      yield batch;
      const next = new Set<string>();
      for (const name of batch) {
        for (const dependent of this.dependentsOf(name)) {
          const count = (remaining.get(dependent) ?? 0) - 1;
          remaining.set(dependent, count);
          if (count === 0) {
            next.add(dependent);
          }
        }
      }
      batch = next;
    }
  }

  public prerequisitesOf(name: string): ReadonlySet<string> {
    return this.requirePrerequisites(name);
  }

  public dependentsOf(name: string): ReadonlySet<string> {
    const found = this.dependents.get(name);
    if (!found) {
      throw new UnknownUnitError(name);
    }
    return found;
  }

  /**
   * Every unit that directly or indirectly waits on `name`, nearest first.
   */
  public transitiveDependentsOf(name: string): string[] {
    const seen = new Set<string>();
    const queue = [ ...this.dependentsOf(name) ];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      seen.add(current);
      queue.push(...this.dependentsOf(current));
    }
    return Array.from(seen);
  }

  public get(name: string): T {
    const node = this.nodes.get(name);
    if (!node) {
      throw new UnknownUnitError(name);
    }
    return node.value;
  }

  public has(name: string): boolean {
    return this.nodes.has(name);
  }

  public names(): string[] {
    return Array.from(this.nodes.keys());
  }

  public get size(): number {
    return this.nodes.size;
  }

  public freeze(): void {
    this.frozen = true;
  }

  public isFrozen(): boolean {
    return this.frozen;
  }

  private requirePrerequisites(name: string): Set<string> {
    const found = this.prerequisites.get(name);
    if (!found) {
      throw new UnknownUnitError(name);
    }
    return found;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new Error('Dependency graph is frozen');
    }
  }

  /**
   * Depth-first search along prerequisite edges from `from` to `to`.
   */
  private findPath(from: string, to: string): string[] | undefined {
    const visited = new Set<string>();
    const walk = (current: string): string[] | undefined => {
      if (current === to) {
        return [ current ];
      }
      if (visited.has(current)) {
        return undefined;
      }
      visited.add(current);
      for (const next of this.requirePrerequisites(current)) {
        const rest = walk(next);
        if (rest) {
          return [ current, ...rest ];
        }
      }
      return undefined;
    };
    return walk(from);
  }
}
