import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { Readable } from 'stream';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/** Seven days, the longest expiry SigV4 allows. */
export const DEFAULT_UPLOAD_URL_EXPIRY_SECONDS = 604800;

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface DownloadResult {
  filePath: string;
  size: number;
  contentType?: string;
  etag?: string;
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly client: S3Client;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.logger.setContext(S3Service.name);
  }

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const stats = await fs.stat(filePath);
    const fileStream = createReadStream(filePath);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: fileStream,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { bucket, key, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const result = await upload.done();

    this.logger.info({ bucket, key, size: stats.size }, 'File uploaded successfully');

    return {
      key,
      etag: result.ETag || '',
      size: stats.size,
    };
  }

  async downloadToFile(bucket: string, key: string, destPath: string): Promise<DownloadResult> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    if (!(response.Body instanceof Readable)) {
      throw new Error(`Object s3://${bucket}/${key} returned no readable body`);
    }

    const writeStream = createWriteStream(destPath);
    await pipeline(response.Body, writeStream);

    const stats = await fs.stat(destPath);

    this.logger.info(
      { bucket, key, destPath, size: stats.size },
      'File downloaded successfully',
    );

    return {
      filePath: destPath,
      size: stats.size,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  /**
   * Presigned PUT URL for uploading a source video.
   * The uploader must send the same Content-Type header that was signed.
   */
  async getSignedUploadUrl(
    bucket: string,
    key: string,
    contentType: string,
    expiresInSeconds = DEFAULT_UPLOAD_URL_EXPIRY_SECONDS,
  ): Promise<string> {
    const command = new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      ContentType: contentType,
    });

    return getSignedUrl(this.client, command, {
      expiresIn: expiresInSeconds,
    });
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
