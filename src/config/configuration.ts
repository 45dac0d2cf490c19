/**
 * Application Configuration Module
 *
 * Central configuration management for the frame extraction service.
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * The two extraction tunables (frame cap and timeout) may additionally be
 * overridden per invocation from SSM Parameter Store, see
 * `ParameterStoreLimitsAdapter`.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const { outputBucket } = this.configService.get('s3', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Application configuration interface.
 *
 * Organized by concern (aws, sqs, s3, ssm, extraction, storage).
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    videoRequestsUrl: string;
    notificationQueueUrl: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  s3: {
    outputBucket: string;
    /** Bucket used when a trigger message carries a bare object key. */
    inputBucket: string;
    outputBasePrefix: string;
  };
  ssm: {
    maxFramesParameter?: string;
    timeoutParameter?: string;
    cacheTtlMs: number;
  };
  /**
   * Defaults for the bounded frame extractor.
   *
   * ### maxFrames (Environment: EXTRACTION_MAX_FRAMES)
   * - Unset means no frame cap; extraction then stops on end of source,
   *   timeout or low disk space only.
   *
   * ### timeoutMs (Environment: EXTRACTION_TIMEOUT_MS)
   * - Wall-clock budget for the extraction loop, checked once per frame.
   * - Default 240000 (4 minutes) leaves headroom for packaging and upload
   *   inside a 5 minute visibility window.
   *
   * ### lowDiskThresholdBytes (Environment: LOW_DISK_THRESHOLD_MB)
   * - Extraction halts when free space on the scratch volume drops below
   *   this value. Sampled every 50 frames. Default 50 MB.
   */
  extraction: {
    maxFrames?: number;
    timeoutMs: number;
    lowDiskThresholdBytes: number;
    ffmpegPath?: string;
    ffprobePath?: string;
  };
  storage: {
    tempDir: string;
  };
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      videoRequestsUrl: env.SQS_VIDEO_REQUESTS_URL,
      notificationQueueUrl: env.NOTIFICATION_QUEUE_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    s3: {
      outputBucket: env.OUTPUT_BUCKET,
      inputBucket: env.INPUT_BUCKET ?? env.OUTPUT_BUCKET,
      outputBasePrefix: env.OUTPUT_BASE_PREFIX,
    },
    ssm: {
      maxFramesParameter: env.SSM_MAX_FRAMES_PARAMETER,
      timeoutParameter: env.SSM_TIMEOUT_PARAMETER,
      cacheTtlMs: env.SSM_CACHE_TTL_MS,
    },
    extraction: {
      maxFrames: env.EXTRACTION_MAX_FRAMES,
      timeoutMs: env.EXTRACTION_TIMEOUT_MS,
      lowDiskThresholdBytes: Math.round(env.LOW_DISK_THRESHOLD_MB * BYTES_PER_MB),
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
    },
    storage: {
      tempDir: env.TEMP_DIR,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
};
