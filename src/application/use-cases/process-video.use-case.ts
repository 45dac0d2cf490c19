import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import { AppConfig } from '../../config/configuration';
import { ProcessVideoPort } from '../ports/input/process-video.port';
import { FileStoragePort } from '../ports/output/file-storage.port';
import { ArchiveBuilderPort } from '../ports/output/archive-builder.port';
import { NotifierPort } from '../ports/output/notifier.port';
import { ARCHIVE_BUILDER_PORT, FILE_STORAGE_PORT, NOTIFIER_PORT } from '../ports/port.tokens';
import { FrameExtractorService } from '../services/frame-extractor.service';
import { ProcessingRequest } from '../../domain/value-objects/processing-request.vo';
import { ExtractionLimits } from '../../domain/value-objects/extraction-limits.vo';
import { ProcessingOutcome } from '../../domain/value-objects/processing-outcome.vo';
import { ProcessingStage } from '../../domain/value-objects/processing-stage.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { withScratchDirectory } from '../../shared/utils/scratch-directory.util';
import {
  formatOutputLocation,
  objectBaseName,
  objectName,
} from '../../shared/utils/s3-path.util';
import { errorMessage } from '../../shared/errors';

const FRAMES_DIRECTORY = 'frames';

/**
 * Process Video Use Case (request orchestrator)
 *
 * DOWNLOADING -> EXTRACTING -> [PACKAGING -> UPLOADING] -> NOTIFYING -> DONE
 *
 * Exactly one notification is sent per request. A stage failure produces a
 * FAILURE notification and the stage error is re-thrown unchanged; if that
 * notification fails too, the stage error still wins. The request's scratch
 * directory is removed on every path.
 */
@Injectable()
export class ProcessVideoUseCase implements ProcessVideoPort {
  private readonly tempDir: string;
  private readonly outputBucket: string;
  private readonly outputBasePrefix: string;

  constructor(
    @Inject(FILE_STORAGE_PORT) private readonly fileStorage: FileStoragePort,
    @Inject(ARCHIVE_BUILDER_PORT) private readonly archiveBuilder: ArchiveBuilderPort,
    @Inject(NOTIFIER_PORT) private readonly notifier: NotifierPort,
    private readonly frameExtractor: FrameExtractorService,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const s3Config = this.configService.get('s3', { infer: true });
    const storageConfig = this.configService.get('storage', { infer: true });

    this.tempDir = storageConfig.tempDir;
    this.outputBucket = s3Config.outputBucket;
    this.outputBasePrefix = s3Config.outputBasePrefix;

    this.logger.setContext(ProcessVideoUseCase.name);
  }

  async execute(request: ProcessingRequest, limits: ExtractionLimits): Promise<void> {
    const requestLogger = this.logger.withRequestId(request.requestId);

    requestLogger.info(
      { source: request.sourceUri, notificationTarget: request.notificationTarget },
      'Starting video processing workflow',
    );

    await withScratchDirectory(
      this.tempDir,
      request.requestId,
      (scratchDir) => this.process(request, limits, scratchDir, requestLogger),
      (error, directory) =>
        requestLogger.warn(
          { directory, error: errorMessage(error) },
          'Failed to remove scratch directory',
        ),
    );
  }

  private async process(
    request: ProcessingRequest,
    limits: ExtractionLimits,
    scratchDir: string,
    requestLogger: PinoLoggerService,
  ): Promise<void> {
    const stage = { current: ProcessingStage.INIT };
    let outcome: ProcessingOutcome;

    try {
      outcome = await this.runStages(request, limits, scratchDir, stage, requestLogger);
    } catch (error) {
      requestLogger.error(
        { stage: stage.current, error },
        `Error processing video: ${errorMessage(error)}`,
      );
      await this.notifyFailure(request, requestLogger);
      throw error;
    }

    await this.notify(request, outcome, requestLogger);

    requestLogger.info(
      {
        stage: ProcessingStage.DONE,
        status: outcome.status,
        resultLocation: outcome.resultLocation,
      },
      'Video processing workflow completed',
    );
  }

  private async runStages(
    request: ProcessingRequest,
    limits: ExtractionLimits,
    scratchDir: string,
    stage: { current: ProcessingStage },
    requestLogger: PinoLoggerService,
  ): Promise<ProcessingOutcome> {
    const enter = (next: ProcessingStage) => {
      stage.current = next;
      requestLogger.debug({ stage: next }, 'Stage started');
    };

    enter(ProcessingStage.DOWNLOADING);
    const videoPath = join(scratchDir, objectName(request.sourceKey));
    await this.fileStorage.downloadFile(request.sourceBucket, request.sourceKey, videoPath);

    enter(ProcessingStage.EXTRACTING);
    const framesDir = join(scratchDir, FRAMES_DIRECTORY);
    const extraction = await this.frameExtractor.extract(videoPath, framesDir, limits);

    if (extraction.frameCount === 0) {
      requestLogger.warn(
        { stopReason: extraction.stopReason },
        'No frames extracted, skipping packaging and upload',
      );
      return ProcessingOutcome.noFramesExtracted();
    }

    enter(ProcessingStage.PACKAGING);
    const archiveName = `${objectBaseName(request.sourceKey)}_frames.${this.archiveBuilder.extension}`;
    const archivePath = await this.archiveBuilder.createArchive(
      framesDir,
      join(scratchDir, archiveName),
    );

    enter(ProcessingStage.UPLOADING);
    const output = formatOutputLocation(
      this.outputBucket,
      this.outputBasePrefix,
      request.requestId,
      archiveName,
      new Date(),
    );
    await this.fileStorage.uploadFile(this.outputBucket, output.key, archivePath, {
      contentType: 'application/zip',
      metadata: {
        requestId: request.requestId,
        frameCount: extraction.frameCount.toString(),
        stopReason: extraction.stopReason,
      },
    });

    requestLogger.info(
      {
        frameCount: extraction.frameCount,
        stopReason: extraction.stopReason,
        elapsedMs: extraction.elapsedMs,
        resultLocation: output.location,
      },
      'Frames packaged and uploaded',
    );

    return ProcessingOutcome.success(output.location);
  }

  private async notify(
    request: ProcessingRequest,
    outcome: ProcessingOutcome,
    requestLogger: PinoLoggerService,
  ): Promise<void> {
    requestLogger.debug({ stage: ProcessingStage.NOTIFYING }, 'Stage started');
    await this.notifier.notify(
      request.notificationTarget,
      request.requestId,
      outcome.resultLocation,
      outcome.status,
    );
  }

  private async notifyFailure(
    request: ProcessingRequest,
    requestLogger: PinoLoggerService,
  ): Promise<void> {
    try {
      await this.notify(request, ProcessingOutcome.failure(), requestLogger);
      requestLogger.info('Sent failure notification');
    } catch (notificationError) {
      // The stage error is the one re-thrown to the caller
      requestLogger.error(
        { error: notificationError },
        'Failed to send failure notification',
      );
    }
  }
}
