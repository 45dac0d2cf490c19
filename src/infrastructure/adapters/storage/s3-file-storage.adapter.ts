import { Injectable } from '@nestjs/common';
import {
  FileStoragePort,
  UploadFileOptions,
  UploadResult,
} from '../../../application/ports/output/file-storage.port';
import { S3Service } from '../../../shared/aws/s3/s3.service';
import { TransferError, errorMessage } from '../../../shared/errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { toS3Uri } from '../../../shared/utils/s3-path.util';

/**
 * S3 File Storage Adapter
 * Implements FileStoragePort using AWS S3. Every SDK failure surfaces as a
 * TransferError carrying the SDK error name (`NoSuchKey`, `AccessDenied`, ...).
 */
@Injectable()
export class S3FileStorageAdapter implements FileStoragePort {
  constructor(
    private readonly s3Service: S3Service,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(S3FileStorageAdapter.name);
  }

  async downloadFile(bucket: string, key: string, destinationPath: string): Promise<void> {
    this.logger.debug({ bucket, key, destinationPath }, 'Downloading file from S3');

    try {
      await this.s3Service.downloadToFile(bucket, key, destinationPath);
    } catch (error) {
      throw this.transferError('download', bucket, key, error);
    }
  }

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult> {
    this.logger.debug({ bucket, key, filePath }, 'Uploading file to S3');

    try {
      const result = await this.s3Service.uploadFile(bucket, key, filePath, {
        contentType: options?.contentType,
        metadata: options?.metadata,
      });

      return {
        key,
        bucket,
        etag: result.etag,
        location: toS3Uri(bucket, key),
      };
    } catch (error) {
      throw this.transferError('upload', bucket, key, error);
    }
  }

  private transferError(
    operation: 'download' | 'upload',
    bucket: string,
    key: string,
    error: unknown,
  ): TransferError {
    const reason = error instanceof Error ? error.name : undefined;
    return new TransferError(
      `Failed to ${operation} ${toS3Uri(bucket, key)}: ${errorMessage(error)}`,
      { bucket, key, reason },
      { cause: error },
    );
  }
}
