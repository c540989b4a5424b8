/**
 * Human-readable formatting helpers
 */

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/**
 * Format a byte count using 1024-based units, rounded to two decimals.
 * Zero and negative counts render as "0 B".
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) {
    return "0 B";
  }

  const exponent = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1024)),
    BYTE_UNITS.length - 1,
  );
  const value = Math.round((bytes / 1024 ** exponent) * 100) / 100;

  return `${value} ${BYTE_UNITS[exponent]}`;
}

/**
 * Format a duration as minutes and seconds, e.g. "2m 5.3s"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(ms, 0) / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;
  return `${minutes}m ${seconds.toFixed(1)}s`;
}
