import { posix } from 'path';

const S3_SCHEME = 's3://';

export interface S3ObjectRef {
  bucket: string;
  key: string;
}

export interface OutputLocation {
  key: string;
  /** `s3://bucket/key` form reported to consumers of the notification. */
  location: string;
}

/**
 * Splits `s3://bucket/some/key` into bucket and key.
 */
export function parseS3Uri(uri: string): S3ObjectRef {
  if (!uri.startsWith(S3_SCHEME)) {
    throw new Error(`Invalid S3 path format: ${uri}`);
  }

  const remainder = uri.slice(S3_SCHEME.length);
  const separator = remainder.indexOf('/');
  const bucket = separator === -1 ? remainder : remainder.slice(0, separator);
  const key = separator === -1 ? '' : remainder.slice(separator + 1);

  if (!bucket || !key) {
    throw new Error(`Invalid S3 path format (missing bucket or key): ${uri}`);
  }

  return { bucket, key };
}

export function toS3Uri(bucket: string, key: string): string {
  return `${S3_SCHEME}${bucket}/${key}`;
}

/**
 * UTC calendar date, `YYYY-MM-DD`.
 */
export function formatDatePartition(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Key layout for uploaded results:
 * `<basePrefix>/<YYYY-MM-DD>/<requestId>/<fileName>`.
 */
export function formatOutputLocation(
  bucket: string,
  basePrefix: string,
  requestId: string,
  fileName: string,
  date: Date,
): OutputLocation {
  if (!bucket || !fileName) {
    throw new Error('Both bucket and file name must be provided.');
  }

  const prefix = basePrefix.replace(/^\/+|\/+$/g, '');
  const segments = [prefix, formatDatePartition(date), requestId, fileName].filter(
    (segment) => segment.length > 0,
  );
  const key = segments.join('/');

  return { key, location: toS3Uri(bucket, key) };
}

/**
 * Object name without its directories, e.g. `sample.mp4` for `videos/a/sample.mp4`.
 */
export function objectName(key: string): string {
  return posix.basename(key);
}

/**
 * Object name without its extension, e.g. `sample` for `videos/a/sample.mp4`.
 */
export function objectBaseName(key: string): string {
  return posix.parse(key).name;
}
