import { describe, it, expect, afterEach, vi } from 'vitest';
import configuration from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';
import { ConfigurationError } from '../../../src/shared/errors';

const REQUIRED_ENV = {
  SQS_VIDEO_REQUESTS_URL: 'https://sqs.us-east-1.amazonaws.com/000000000000/video-requests',
  NOTIFICATION_QUEUE_URL: 'https://sqs.us-east-1.amazonaws.com/000000000000/notifications',
  OUTPUT_BUCKET: 'output-bucket',
};

describe('validateEnv', () => {
  it('should apply defaults for optional settings', () => {
    const env = validateEnv(REQUIRED_ENV);

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      AWS_REGION: 'us-east-1',
      SQS_WAIT_TIME_SECONDS: 20,
      OUTPUT_BASE_PREFIX: 'processed',
      SSM_CACHE_TTL_MS: 60000,
      EXTRACTION_TIMEOUT_MS: 240000,
      LOW_DISK_THRESHOLD_MB: 50,
      TEMP_DIR: '/tmp/video-frames',
    });
    expect(env.EXTRACTION_MAX_FRAMES).toBeUndefined();
    expect(env.INPUT_BUCKET).toBeUndefined();
  });

  it('should coerce numeric settings', () => {
    const env = validateEnv({
      ...REQUIRED_ENV,
      EXTRACTION_MAX_FRAMES: '500',
      EXTRACTION_TIMEOUT_MS: '60000',
      LOW_DISK_THRESHOLD_MB: '12.5',
    });

    expect(env.EXTRACTION_MAX_FRAMES).toBe(500);
    expect(env.EXTRACTION_TIMEOUT_MS).toBe(60000);
    expect(env.LOW_DISK_THRESHOLD_MB).toBe(12.5);
  });

  it('should treat blank optional names as unset', () => {
    const env = validateEnv({
      ...REQUIRED_ENV,
      INPUT_BUCKET: '  ',
      SSM_TIMEOUT_PARAMETER: '',
      EXTRACTION_MAX_FRAMES: ' ',
    });

    expect(env.INPUT_BUCKET).toBeUndefined();
    expect(env.EXTRACTION_MAX_FRAMES).toBeUndefined();
    expect(env.SSM_TIMEOUT_PARAMETER).toBeUndefined();
  });

  it('should throw ConfigurationError naming each invalid setting', () => {
    const attempt = () =>
      validateEnv({ SQS_VIDEO_REQUESTS_URL: 'not-a-url', OUTPUT_BUCKET: 'output-bucket' });

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow(/SQS_VIDEO_REQUESTS_URL/);
    expect(attempt).toThrow(/NOTIFICATION_QUEUE_URL/);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => validateEnv({ ...REQUIRED_ENV, EXTRACTION_TIMEOUT_MS: '0' })).toThrow(
      /EXTRACTION_TIMEOUT_MS/,
    );
  });
});

describe('configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const stubRequiredEnv = () => {
    for (const [name, value] of Object.entries(REQUIRED_ENV)) {
      vi.stubEnv(name, value);
    }
    // Blank values count as unset
    vi.stubEnv('INPUT_BUCKET', '');
    vi.stubEnv('OUTPUT_BASE_PREFIX', 'processed');
    vi.stubEnv('AWS_ACCESS_KEY_ID', '');
    vi.stubEnv('AWS_SECRET_ACCESS_KEY', '');
  };

  it('should default the input bucket to the output bucket', () => {
    stubRequiredEnv();

    const config = configuration();

    expect(config.s3).toEqual({
      outputBucket: 'output-bucket',
      inputBucket: 'output-bucket',
      outputBasePrefix: 'processed',
    });
  });

  it('should convert the low disk threshold to bytes', () => {
    stubRequiredEnv();
    vi.stubEnv('LOW_DISK_THRESHOLD_MB', '2');

    expect(configuration().extraction.lowDiskThresholdBytes).toBe(2 * 1024 * 1024);
  });

  it('should only attach credentials when both keys are set', () => {
    stubRequiredEnv();
    vi.stubEnv('AWS_ACCESS_KEY_ID', 'test-key');

    expect(configuration().aws.credentials).toBeUndefined();

    vi.stubEnv('AWS_SECRET_ACCESS_KEY', 'test-secret');

    expect(configuration().aws.credentials).toEqual({
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    });
  });
});
