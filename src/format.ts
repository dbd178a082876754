/**
 * @fileoverview Human readable formatting for sizes and durations.
 */

const BYTE_UNITS: ReadonlyArray<string> = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Formats a byte count with decimal (1000-based) units, as the engine CLI prints image sizes.
 *
 * @param bytes - Size in bytes; undefined yields "N/A".
 */
export function formatBytes(bytes: number | undefined): string {
  if (bytes === undefined || !Number.isFinite(bytes) || bytes < 0) {
    return 'N/A';
  }
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1000 && unitIndex < BYTE_UNITS.length - 1) {
    value /= 1000;
    unitIndex++;
  }
  const unit = BYTE_UNITS[unitIndex] ?? 'B';
  return unitIndex === 0 ? `${value} ${unit}` : `${value.toFixed(2)} ${unit}`;
}

/**
 * Formats the time between two `performance.now()` readings, e.g. "1m 5s" or "850ms".
 */
export function formatTimeBetween(startTime: number, endTime: number): string {
  const totalMs = Math.max(0, Math.round(endTime - startTime));
  if (totalMs < 1000) {
    return `${totalMs}ms`;
  }
  const totalSeconds = Math.floor(totalMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}
