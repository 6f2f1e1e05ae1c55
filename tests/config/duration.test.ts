import { describe, expect, it } from 'vitest';
import { formatDuration, parseDuration } from '../../src/config/duration';

describe('duration', () => {
  it.each([
    [ '10s', 10_000 ],
    [ '1m30s', 90_000 ],
    [ '500ms', 500 ],
    [ '2h', 7_200_000 ],
    [ '1.5s', 1_500 ],
    [ '0', 0 ],
    [ '0s', 0 ],
    [ ' 5s ', 5_000 ],
  ])('parses %s', (text, expected) => {
    expect(parseDuration(text)).toBe(expected);
  });

  it.each([ '', '10', 'ten seconds', '5s later', '1d' ])('rejects %j', (text) => {
    expect(parseDuration(text)).toBeUndefined();
  });

  it('formats milliseconds in the largest whole unit', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(120_000)).toBe('2m');
    expect(formatDuration(90_000)).toBe('90s');
    expect(formatDuration(250)).toBe('250ms');
  });
});
