/**
 * Human-readable byte sizes and durations for the `*-human` and `latency`
 * fields.
 */
import { KILOBYTE, MEGABYTE } from '@shared/constants';

const NS_PER_MICROSECOND = 1_000;
const NS_PER_MILLISECOND = 1_000_000;
const NS_PER_SECOND = 1_000_000_000;

/**
 * Drops trailing '0' and '.' characters one at a time. Applied to the whole
 * string, so "10.00" becomes "1" as well as "2.50" becoming "2.5".
 */
function trimZeros(value: string): string {
  let end = value.length;
  while (end > 0 && (value[end - 1] === '0' || value[end - 1] === '.')) {
    end--;
  }
  return value.slice(0, end);
}

/**
 * `1023` → `1023B`, `1536` → `1.5KB`, `1048576` → `1MB`.
 */
export function getHumanReadableSize(size: number): string {
  if (size < KILOBYTE) {
    return `${size}B`;
  }
  if (size < MEGABYTE) {
    return `${trimZeros((size / KILOBYTE).toFixed(2))}KB`;
  }
  return `${trimZeros((size / MEGABYTE).toFixed(2))}MB`;
}

/** `value` split at `digits` decimal places, trailing fractional zeros removed. */
function fixedPoint(value: number, digits: number): string {
  const scale = 10 ** digits;
  const whole = Math.floor(value / scale);
  const fraction = String(value % scale)
    .padStart(digits, '0')
    .replace(/0+$/, '');
  return fraction ? `${whole}.${fraction}` : String(whole);
}

/**
 * Formats a duration given in nanoseconds using the largest fitting unit below
 * a second (`750ns`, `12.5µs`, `350ms`) and h/m/s composition above it
 * (`1.5s`, `1m30s`, `2h0m5s`). Zero is `0s`.
 */
export function formatDuration(nanoseconds: number): string {
  const ns = Math.round(Math.abs(nanoseconds));
  if (ns === 0) {
    return '0s';
  }
  const sign = nanoseconds < 0 ? '-' : '';

  if (ns < NS_PER_MICROSECOND) {
    return `${sign}${ns}ns`;
  }
  if (ns < NS_PER_MILLISECOND) {
    return `${sign}${fixedPoint(ns, 3)}µs`;
  }
  if (ns < NS_PER_SECOND) {
    return `${sign}${fixedPoint(ns, 6)}ms`;
  }

  const totalSeconds = Math.floor(ns / NS_PER_SECOND);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secondsNs = ns - (hours * 3600 + minutes * 60) * NS_PER_SECOND;

  let out = `${fixedPoint(secondsNs, 9)}s`;
  if (hours > 0 || minutes > 0) {
    out = `${minutes}m${out}`;
  }
  if (hours > 0) {
    out = `${hours}h${out}`;
  }
  return sign + out;
}
