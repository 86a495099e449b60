/**
 * Time Utilities
 *
 * Stream times are plain seconds. ffmpeg accepts seconds or
 * `[HH:]MM:SS[.fff]` timecodes, so both are parsed here.
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse a timecode string (`HH:MM:SS.fff`, `MM:SS` or `SS.fff`) to seconds
 */
export function parseTimecode(timecode: string): number {
  const parts = timecode.trim().split(':');
  if (parts.length === 0 || parts.length > 3) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }

  let seconds = 0;
  for (const part of parts) {
    if (!/^\d+(\.\d+)?$/.test(part)) {
      throw new Error(`Invalid timecode format: ${timecode}`);
    }
    seconds = seconds * 60 + parseFloat(part);
  }
  return seconds;
}

/**
 * Format seconds the way ffmpeg arguments expect them: no trailing zeros,
 * microsecond precision at most.
 */
export function formatSeconds(seconds: number): string {
  return String(Math.round(seconds * 1e6) / 1e6);
}
