/**
 * Bounds applied to a single extraction run.
 */
export interface ExtractionLimits {
  /** Frame cap; undefined means no cap. */
  readonly maxFrames?: number;
  readonly timeoutMs: number;
  readonly lowDiskThresholdBytes: number;
}

export function createExtractionLimits(limits: ExtractionLimits): ExtractionLimits {
  if (
    limits.maxFrames !== undefined &&
    (!Number.isInteger(limits.maxFrames) || limits.maxFrames < 0)
  ) {
    throw new Error(`maxFrames must be a non-negative integer, got ${limits.maxFrames}`);
  }

  if (!Number.isFinite(limits.timeoutMs) || limits.timeoutMs <= 0) {
    throw new Error(`timeoutMs must be positive, got ${limits.timeoutMs}`);
  }

  if (!Number.isFinite(limits.lowDiskThresholdBytes) || limits.lowDiskThresholdBytes < 0) {
    throw new Error(
      `lowDiskThresholdBytes cannot be negative, got ${limits.lowDiskThresholdBytes}`,
    );
  }

  return Object.freeze({
    ...(limits.maxFrames !== undefined && { maxFrames: limits.maxFrames }),
    timeoutMs: limits.timeoutMs,
    lowDiskThresholdBytes: limits.lowDiskThresholdBytes,
  });
}
