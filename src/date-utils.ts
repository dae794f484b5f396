/**
 * @fileoverview Duration formatting for log lines and the job summary.
 */

import { formatDuration, intervalToDuration } from 'date-fns';

/**
 * Formats the time difference between start and end timestamps into a human-readable duration string.
 * Durations under one second are rendered in whole milliseconds, since date-fns drops them.
 *
 * @param startTimestampMs - Start timestamp in milliseconds
 * @param endTimestampMs - End timestamp in milliseconds
 * @returns Human-readable duration string (e.g., "1 minute 3 seconds", "250 ms")
 */
export function formatTimeBetween(startTimestampMs: number, endTimestampMs: number): string {
  const elapsedMs = Math.max(0, endTimestampMs - startTimestampMs);
  if (elapsedMs < 1000) {
    return `${Math.round(elapsedMs)} ms`;
  }

  const duration = intervalToDuration({
    start: 0,
    end: elapsedMs,
  });

  return formatDuration(duration, {
    format: ['hours', 'minutes', 'seconds'],
    zero: false,
    delimiter: ' ',
  });
}
