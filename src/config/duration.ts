const UNIT_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
  us: 0.001,
  µs: 0.001,
  ns: 0.000_001,
};

const TOKEN = /(\d+(?:\.\d+)?)(ms|us|µs|ns|h|m|s)/gu;

/**
 * Parses a compose duration such as `1m30s`, `500ms` or `10s` into milliseconds.
 * Returns `undefined` when the text is not a duration.
 */
export function parseDuration(value: string): number | undefined {
  const text = value.trim();
  if (text === '0') {
    return 0;
  }
  if (text.length === 0) {
    return undefined;
  }

  let consumed = '';
  let total = 0;
  for (const match of text.matchAll(TOKEN)) {
    consumed += match[0];
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  if (consumed !== text) {
    return undefined;
  }
  return Math.round(total);
}

export function formatDuration(ms: number): string {
  if (ms === 0) {
    return '0s';
  }
  if (ms % 60_000 === 0) {
    return `${ms / 60_000}m`;
  }
  if (ms % 1_000 === 0) {
    return `${ms / 1_000}s`;
  }
  return `${ms}ms`;
}
