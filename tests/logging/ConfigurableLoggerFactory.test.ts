import type { Format } from 'logform';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurableLoggerFactory } from '../../src/logging/ConfigurableLoggerFactory';
import { logContext } from '../../src/logging/LogContext';

class InspectableFactory extends ConfigurableLoggerFactory {
  public formatFor(label: string): Format {
    return this.getFormat(label);
  }

  public transportCount(label: string): number {
    return this.createTransports(label).length;
  }
}

function render(format: Format, message: string): unknown {
  const result = format.transform({ level: 'info', message });
  if (typeof result === 'boolean') {
    throw new Error('log entry was filtered');
  }
  return result[Symbol.for('message')];
}

describe('ConfigurableLoggerFactory', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('prints timestamp, label, level and message', () => {
    const format = new InspectableFactory('info', { colorize: false }).formatFor('Supervisor');
    expect(render(format, 'Supervising 4 unit(s)'))
      .toBe('2026-01-02T03:04:05.000Z [Supervisor] info: Supervising 4 unit(s)');
  });

  it('adds the unit of the current log context', () => {
    const format = new InspectableFactory('info', { colorize: false }).formatFor('Supervisor');
    const line = logContext.run({ unit: 'cache' }, () => render(format, 'cache: pending -> starting'));
    expect(line).toBe('2026-01-02T03:04:05.000Z [Supervisor] <cache> info: cache: pending -> starting');
  });

  it('logs to the console only unless a file is configured', () => {
    expect(new InspectableFactory('info').transportCount('x')).toBe(1);
  });
});
