import { z } from 'zod';
import { ConfigurationError } from '../shared/errors';

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // SQS
  SQS_VIDEO_REQUESTS_URL: z.string().url(),
  NOTIFICATION_QUEUE_URL: z.string().url(),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().min(0).max(20).default(20),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().min(0).max(43200).default(900),

  // S3
  OUTPUT_BUCKET: z.string().min(1),
  INPUT_BUCKET: optionalNonEmpty,
  OUTPUT_BASE_PREFIX: z.string().default('processed'),

  // SSM Parameter Store
  SSM_MAX_FRAMES_PARAMETER: optionalNonEmpty,
  SSM_TIMEOUT_PARAMETER: optionalNonEmpty,
  SSM_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60000),

  // Extraction
  EXTRACTION_MAX_FRAMES: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(0).optional(),
  ),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(240000),
  LOW_DISK_THRESHOLD_MB: z.coerce.number().min(0).default(50),
  FFMPEG_PATH: optionalNonEmpty,
  FFPROBE_PATH: optionalNonEmpty,

  // Scratch storage
  TEMP_DIR: z.string().default('/tmp/video-frames'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
