/**
 * Retention policy - delta or fresh base?
 *
 * PURE: arithmetic only
 */

import { RetentionOptions } from '../types';

/**
 * Snapshots under 2 KiB tolerate proportionally larger deltas
 */
export const DEFAULT_RETENTION: RetentionOptions = {
  smallFileThresholdBytes: 2048,
  smallFileRatio: 0.95,
  largeFileRatio: 0.3,
};

/**
 * Ratio of the predecessor size a delta may reach before promotion
 */
export function deltaThresholdRatio(
  baseSizeBytes: number,
  options: RetentionOptions = DEFAULT_RETENTION
): number {
  return baseSizeBytes < options.smallFileThresholdBytes
    ? options.smallFileRatio
    : options.largeFileRatio;
}

/**
 * True when the new snapshot should be stored as a base instead of a delta
 */
export function shouldPromoteToBase(
  baseSizeBytes: number,
  deltaSizeBytes: number,
  options: RetentionOptions = DEFAULT_RETENTION
): boolean {
  return deltaSizeBytes > baseSizeBytes * deltaThresholdRatio(baseSizeBytes, options);
}
