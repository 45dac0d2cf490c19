import { Module } from '@nestjs/common';

// Shared services (existing infrastructure)
import { AwsModule } from '../shared/aws/aws.module';
import { LoggingModule } from '../shared/logging/logging.module';

import {
  ARCHIVE_BUILDER_PORT,
  DISK_SPACE_PORT,
  EXTRACTION_LIMITS_PORT,
  FILE_STORAGE_PORT,
  FRAME_SOURCE_PORT,
  NOTIFIER_PORT,
} from '../application/ports/port.tokens';

// Adapters (implementations)
import { S3FileStorageAdapter } from './adapters/storage/s3-file-storage.adapter';
import { SqsNotifierAdapter } from './adapters/messaging/sqs-notifier.adapter';
import { ZipArchiveBuilderAdapter } from './adapters/archive/zip-archive-builder.adapter';
import { FfmpegFrameSourceAdapter } from './adapters/media/ffmpeg-frame-source.adapter';
import { StatfsDiskSpaceAdapter } from './adapters/system/statfs-disk-space.adapter';
import { ParameterStoreLimitsAdapter } from './adapters/config/parameter-store-limits.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * Use cases depend on the port tokens only; swapping an adapter means
 * changing the binding here.
 */
@Module({
  imports: [AwsModule, LoggingModule],
  providers: [
    // Storage adapters
    {
      provide: FILE_STORAGE_PORT,
      useClass: S3FileStorageAdapter,
    },

    // Messaging adapters
    {
      provide: NOTIFIER_PORT,
      useClass: SqsNotifierAdapter,
    },

    // Packaging
    {
      provide: ARCHIVE_BUILDER_PORT,
      useClass: ZipArchiveBuilderAdapter,
    },

    // Media decoding
    {
      provide: FRAME_SOURCE_PORT,
      useClass: FfmpegFrameSourceAdapter,
    },
    {
      provide: DISK_SPACE_PORT,
      useClass: StatfsDiskSpaceAdapter,
    },

    // Runtime tunables
    {
      provide: EXTRACTION_LIMITS_PORT,
      useClass: ParameterStoreLimitsAdapter,
    },
  ],
  exports: [
    FILE_STORAGE_PORT,
    NOTIFIER_PORT,
    ARCHIVE_BUILDER_PORT,
    FRAME_SOURCE_PORT,
    DISK_SPACE_PORT,
    EXTRACTION_LIMITS_PORT,
  ],
})
export class InfrastructureModule {}
