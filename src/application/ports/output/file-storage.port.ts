/**
 * Upload File Options
 */
export interface UploadFileOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/**
 * Upload Result
 */
export interface UploadResult {
  key: string;
  bucket: string;
  etag: string;
  location: string;
}

/**
 * File Storage Port (Driven Port)
 * Object storage operations the orchestrator needs (S3).
 * Implementations raise TransferError when the object or bucket is absent or
 * access is denied.
 */
export interface FileStoragePort {
  /**
   * Download an object to a local path
   */
  downloadFile(bucket: string, key: string, destinationPath: string): Promise<void>;

  /**
   * Upload a local file
   */
  uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult>;
}
