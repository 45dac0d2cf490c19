import { Inject, Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import { join } from 'path';
import { DISK_SPACE_PORT, FRAME_SOURCE_PORT } from '../ports/port.tokens';
import { FrameEncoding, FrameSource, FrameSourcePort } from '../ports/output/frame-source.port';
import { DiskSpacePort } from '../ports/output/disk-space.port';
import { ExtractionLimits } from '../../domain/value-objects/extraction-limits.vo';
import { ExtractionResult, StopReason } from '../../domain/value-objects/extraction-result.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { errorMessage } from '../../shared/errors';

/**
 * JPEG encoding for every written frame: ffmpeg `-q:v 3`, roughly libjpeg
 * quality 90. Fixed so that output size per frame is bounded and repeatable.
 */
export const JPEG_QUALITY = 3;

export const FRAME_ENCODING: FrameEncoding = { format: 'jpg', quality: JPEG_QUALITY };

/** Free space is sampled once per this many written frames. */
export const DISK_CHECK_INTERVAL = 50;

const PROGRESS_LOG_INTERVAL = 100;

/**
 * `frame_00000000.jpg`, zero-based and padded to 8 digits.
 */
export function frameFileName(index: number): string {
  return `frame_${index.toString().padStart(8, '0')}.${FRAME_ENCODING.format}`;
}

/**
 * Bounded Frame Extractor
 *
 * Reads frames sequentially from a frame source into `outputDir` until the
 * first of: timeout, frame cap, end of source, low disk space. Conditions are
 * checked in that order each iteration; the disk sample is taken right after
 * a frame is written, so `frameCount` always equals the files on disk.
 */
@Injectable()
export class FrameExtractorService {
  constructor(
    @Inject(FRAME_SOURCE_PORT) private readonly frameSource: FrameSourcePort,
    @Inject(DISK_SPACE_PORT) private readonly diskSpace: DiskSpacePort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(FrameExtractorService.name);
  }

  async extract(
    sourcePath: string,
    outputDir: string,
    limits: ExtractionLimits,
  ): Promise<ExtractionResult> {
    await fs.mkdir(outputDir, { recursive: true });
    const source = await this.frameSource.open(sourcePath, FRAME_ENCODING);

    this.logger.info(
      {
        sourcePath,
        maxFrames: limits.maxFrames ?? null,
        timeoutMs: limits.timeoutMs,
        lowDiskThresholdBytes: limits.lowDiskThresholdBytes,
      },
      'Starting frame extraction',
    );

    const startedAt = Date.now();
    let outcome: { frameCount: number; stopReason: StopReason };

    try {
      outcome = await this.runLoop(source, outputDir, limits, startedAt);
    } finally {
      await this.release(source, sourcePath);
    }

    const { frameCount, stopReason } = outcome;
    const elapsedMs = Date.now() - startedAt;

    this.logger.info({ frameCount, stopReason, elapsedMs }, 'Finished frame extraction');

    return { frameCount, stopReason, elapsedMs };
  }

  /** A close failure is logged; it never replaces the loop's own result or error. */
  private async release(source: FrameSource, sourcePath: string): Promise<void> {
    try {
      await source.close();
    } catch (error) {
      this.logger.warn({ sourcePath, error: errorMessage(error) }, 'Failed to close frame source');
    }
  }

  private async runLoop(
    source: FrameSource,
    outputDir: string,
    limits: ExtractionLimits,
    startedAt: number,
  ): Promise<{ frameCount: number; stopReason: StopReason }> {
    let written = 0;
    const stop = (stopReason: StopReason) => ({ frameCount: written, stopReason });

    for (;;) {
      if (Date.now() - startedAt > limits.timeoutMs) {
        this.logger.warn(
          { frameCount: written, timeoutMs: limits.timeoutMs },
          'Extraction timed out',
        );
        return stop(StopReason.TIMEOUT);
      }

      if (limits.maxFrames !== undefined && written >= limits.maxFrames) {
        return stop(StopReason.MAX_FRAMES);
      }

      const frame = await source.readFrame();
      if (frame === null) {
        return stop(StopReason.END_OF_SOURCE);
      }

      await fs.writeFile(join(outputDir, frameFileName(written)), frame);
      written++;

      if (written % PROGRESS_LOG_INTERVAL === 0) {
        this.logger.info({ frameCount: written }, 'Extracted frames');
      }

      if (written % DISK_CHECK_INTERVAL === 0) {
        const freeBytes = await this.diskSpace.getFreeBytes(outputDir);
        if (freeBytes < limits.lowDiskThresholdBytes) {
          this.logger.warn(
            { frameCount: written, freeBytes, thresholdBytes: limits.lowDiskThresholdBytes },
            'Low disk space, stopping extraction',
          );
          return stop(StopReason.LOW_DISK_SPACE);
        }
      }
    }
  }
}
