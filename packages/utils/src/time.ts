/**
 * Time Utilities
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format a track length in seconds as m:ss or h:mm:ss
 */
export function formatDuration(totalSeconds: number | null | undefined): string {
  if (totalSeconds === null || totalSeconds === undefined || !Number.isFinite(totalSeconds) || totalSeconds < 0) {
    return '--:--';
  }

  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${rest.toString().padStart(2, '0')}`;
  }
  return `${minutes}:${rest.toString().padStart(2, '0')}`;
}

/**
 * Human form of a timeout or delay: 750ms, 30s, 15min, 1:30 (m:ss)
 */
export function formatInterval(ms: number): string {
  if (ms < 1000) {
    return `${Math.max(0, Math.round(ms))}ms`;
  }
  if (ms < 60000) {
    return `${Math.round(ms / 1000)}s`;
  }
  if (ms % 60000 === 0) {
    return `${ms / 60000}min`;
  }
  return formatDuration(ms / 1000);
}

/**
 * Parse "3:45" or "1:02:03" into seconds. Returns null when the text is not a timecode.
 */
export function parseDuration(text: string): number | null {
  const parts = text.trim().split(':');
  if (parts.length < 2 || parts.length > 3) {
    return null;
  }
  if (!parts.every(part => /^\d+$/.test(part))) {
    return null;
  }
  return parts.reduce((total, part) => total * 60 + parseInt(part, 10), 0);
}
