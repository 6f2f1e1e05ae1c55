import { afterEach, describe, expect, it } from 'vitest';
import { describeUnit, planBatches } from '../../src/cli/commands/plan';
import { toEventRecord } from '../../src/cli/commands/up';
import { DEFAULT_STACK_FILE, resolveStackFile } from '../../src/cli/runtime';
import { DependencyGraph } from '../../src/supervisor/DependencyGraph';
import { check, unit } from '../supervisor/fakes';

describe('plan', () => {
  it('lists the start batches sorted by name', () => {
    const graph = DependencyGraph.fromUnits([
      unit('app', { dependsOn: [ 'store', 'cache' ]}),
      unit('store'),
      unit('cache'),
    ]);
    expect(planBatches(graph)).toEqual([
      { index: 0, units: [ 'cache', 'store' ]},
      { index: 1, units: [ 'app' ]},
    ]);
  });

  it('describes a unit with a health check', () => {
    const app = unit('app', {
      dependsOn: [ 'store', 'cache' ],
      restart: 'always',
      healthcheck: check('curl -f localhost', { intervalMs: 10_000, timeoutMs: 5_000, retries: 3, startPeriodMs: 60_000 }),
    });
    expect(describeUnit(app))
      .toBe('app (restart=always; after=store,cache; check every 10s, timeout 5s, retries 3, start period 1m)');
  });

  it('describes a unit without a health check', () => {
    expect(describeUnit(unit('objects'))).toBe('objects (restart=never; no health check)');
  });
});

describe('up', () => {
  it('serializes transition events with ISO timestamps', () => {
    expect(toEventRecord({ unit: 'cache', from: 'starting', to: 'healthy', at: new Date(Date.UTC(2026, 0, 2)) }))
      .toEqual({ unit: 'cache', from: 'starting', to: 'healthy', at: '2026-01-02T00:00:00.000Z' });
  });
});

describe('resolveStackFile', () => {
  const original = process.env.HEALTHGATE_FILE;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.HEALTHGATE_FILE;
    } else {
      process.env.HEALTHGATE_FILE = original;
    }
  });

  it('prefers the explicit path, then the environment, then the default', () => {
    process.env.HEALTHGATE_FILE = 'stacks/dev.yml';
    expect(resolveStackFile('other.yml')).toBe('other.yml');
    expect(resolveStackFile()).toBe('stacks/dev.yml');
    delete process.env.HEALTHGATE_FILE;
    expect(resolveStackFile()).toBe(DEFAULT_STACK_FILE);
  });
});
