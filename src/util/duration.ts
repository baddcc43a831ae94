import { formatDuration, intervalToDuration } from 'date-fns';

/**
 * Human-readable elapsed time: `4.2s` under a minute, else `2 minutes 5 seconds`.
 */
export function formatElapsed(ms: number): string {
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const duration = intervalToDuration({ start: 0, end: ms });
  return formatDuration(duration, { format: ['days', 'hours', 'minutes', 'seconds'], delimiter: ' ' });
}
