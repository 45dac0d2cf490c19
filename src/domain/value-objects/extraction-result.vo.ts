/**
 * Why the extraction loop stopped.
 */
export enum StopReason {
  END_OF_SOURCE = 'END_OF_SOURCE',
  MAX_FRAMES = 'MAX_FRAMES',
  TIMEOUT = 'TIMEOUT',
  LOW_DISK_SPACE = 'LOW_DISK_SPACE',
}

export interface ExtractionResult {
  readonly frameCount: number;
  readonly stopReason: StopReason;
  readonly elapsedMs: number;
}
