/**
 * Output formatting utilities for CLI messages
 */

const UNITS = ['B', 'KiB', 'MiB', 'GiB'];

/**
 * Human-readable byte count: exact below 1 KiB, one decimal above
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Delta size as a percentage of its predecessor, e.g. "12.5%"
 */
export function formatRatio(deltaSizeBytes: number, baseSizeBytes: number): string {
  if (baseSizeBytes === 0) {
    return 'n/a';
  }
  return `${((deltaSizeBytes / baseSizeBytes) * 100).toFixed(1)}%`;
}
