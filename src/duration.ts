/**
 * Duration parsing for human-readable strings like "500ms", "3s", "10m".
 *
 * All durations are represented as milliseconds (number).
 */

const MS_PER_SECOND = 1_000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const UNIT_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: MS_PER_SECOND,
  m: MS_PER_MINUTE,
  h: MS_PER_HOUR,
};

const DURATION_RE = /^(\d+)(ms|s|m|h)$/;

/**
 * Parse a duration string into milliseconds.
 *
 * Supported units: `ms`, `s`, `m`, `h`. A bare integer is read as seconds.
 * The input is case-insensitive and leading/trailing whitespace is trimmed.
 *
 * @throws {Error} on empty input, unknown unit, signs or fractions.
 */
export function parseDuration(s: string): number {
  const trimmed = s.trim().toLowerCase();

  if (trimmed.length === 0) {
    throw new Error('Duration string must not be empty');
  }

  if (/^\d+$/.test(trimmed)) {
    return toMs(trimmed, MS_PER_SECOND);
  }

  const match = DURATION_RE.exec(trimmed);
  if (match === null) {
    throw new Error(`Invalid duration '${s}': expected <integer><ms|s|m|h>`);
  }

  return toMs(match[1], UNIT_MULTIPLIERS[match[2]]);
}

function toMs(numStr: string, multiplier: number): number {
  const num = Number(numStr);
  if (!Number.isSafeInteger(num)) {
    throw new Error(`Invalid number in duration: '${numStr}'`);
  }
  const ms = num * multiplier;
  if (!Number.isSafeInteger(ms)) {
    throw new Error('Duration is too large');
  }
  return ms;
}

/**
 * Format milliseconds using the largest unit that divides evenly.
 *
 * @example
 * formatDuration(600_000) // "10m"
 * formatDuration(1_500)   // "1500ms"
 * formatDuration(0)       // "0s"
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (ms % MS_PER_HOUR === 0) return `${ms / MS_PER_HOUR}h`;
  if (ms % MS_PER_MINUTE === 0) return `${ms / MS_PER_MINUTE}m`;
  if (ms % MS_PER_SECOND === 0) return `${ms / MS_PER_SECOND}s`;
  return `${ms}ms`;
}
