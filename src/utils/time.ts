export type TimeUnit = 'ms' | 's' | 'm' | 'h';

const UNITS: Record<string, number> = {
  'ms': 1, 's': 1000, 'm': 60 * 1000, 'h': 60 * 60 * 1000
};

/**
 * Parses "250ms", "1.5s", "2m" or "1h" into milliseconds. Plain numbers and
 * unit-less numeric strings are taken in `defaultUnit`.
 */
export function parseTime(timeStr: string | number, defaultUnit: TimeUnit = 'ms'): number {
  if (typeof timeStr === 'number') return timeStr * UNITS[defaultUnit];

  const trimmed = timeStr.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return parseFloat(trimmed) * UNITS[defaultUnit];
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)(ms|s|m|h)$/);
  if (!match) throw new Error(`Invalid time format: ${timeStr}`);

  const [, value, unit] = match;
  return parseFloat(value) * UNITS[unit];
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function formatSeconds(ms: number, digits: number = 3): string {
  return `${(ms / 1000).toFixed(digits)}s`;
}

/**
 * Sleeps until at least `ms` have passed on the monotonic clock. Timers can
 * fire a millisecond early, so a single setTimeout is not enough.
 */
export async function holdFor(ms: number): Promise<void> {
  const until = performance.now() + ms;
  let remaining = ms;
  while (remaining > 0) {
    await sleep(remaining);
    remaining = until - performance.now();
  }
}
