/**
 * Timestamp Formatting
 *
 * Renders cue times as `HH:MM:SS.mmm` and chunk spans as
 * `[HH:MM:SS.mmm–HH:MM:SS.mmm]`.
 *
 * @module chunking/timestamp
 */

/** En dash (U+2013) between the two ends of a range */
export const RANGE_SEPARATOR = '–';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format seconds as `HH:MM:SS.mmm`.
 *
 * Sub-millisecond precision is truncated, not rounded. Hours are not
 * wrapped, so spans over 99 hours simply grow wider.
 *
 * @example
 * ```typescript
 * secondsToTimestamp(3725.25);  // '01:02:05.250'
 * secondsToTimestamp(0.0009);   // '00:00:00.000'
 * ```
 */
export function secondsToTimestamp(seconds: number): string {
  const totalMs = Math.floor(seconds * 1000);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const m = totalMinutes % 60;
  const h = Math.floor(totalMinutes / 60);

  return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)}.${pad(ms, 3)}`;
}

/**
 * Format a span as `[start–end]`.
 */
export function formatTimestampRange(start: number, end: number): string {
  return `[${secondsToTimestamp(start)}${RANGE_SEPARATOR}${secondsToTimestamp(end)}]`;
}
