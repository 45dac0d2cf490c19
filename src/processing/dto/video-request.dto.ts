import { z } from 'zod';
import {
  ProcessingRequest,
  ProcessingRequestProps,
} from '../../domain/value-objects/processing-request.vo';
import { TriggerDecodeError, errorMessage } from '../../shared/errors';
import { parseS3Uri } from '../../shared/utils/s3-path.util';

const nonEmpty = z.string().trim().min(1);

export const VideoRequestMessageSchema = z.object({
  id: nonEmpty,
  /** `s3://bucket/key`, or a bare key in the input bucket. */
  sourceFileKey: nonEmpty,
  notificationTarget: nonEmpty.optional(),
});

/**
 * Message shape emitted by older producers.
 */
export const LegacyVideoRequestMessageSchema = z.object({
  request_id: nonEmpty,
  s3_path: nonEmpty.startsWith('s3://'),
});

export type VideoRequestMessageDto = z.infer<typeof VideoRequestMessageSchema>;
export type LegacyVideoRequestMessageDto = z.infer<typeof LegacyVideoRequestMessageSchema>;
export type TriggerMessageDto = VideoRequestMessageDto | LegacyVideoRequestMessageDto;

export interface TriggerDefaults {
  inputBucket: string;
  notificationQueueUrl: string;
}

/**
 * Decode one raw SQS message body into a ProcessingRequest.
 * Throws TriggerDecodeError for anything that is not a well-formed request.
 */
export function decodeVideoRequest(
  body: string | undefined,
  defaults: TriggerDefaults,
): ProcessingRequest {
  if (!body) {
    throw new TriggerDecodeError('Message body is empty');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new TriggerDecodeError(`Message body is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = isLegacyMessage(payload)
    ? LegacyVideoRequestMessageSchema.safeParse(payload)
    : VideoRequestMessageSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TriggerDecodeError(`Invalid trigger message: ${issues}`, {
      cause: parsed.error,
    });
  }

  try {
    return ProcessingRequest.create(normalize(parsed.data, defaults));
  } catch (error) {
    throw new TriggerDecodeError(`Invalid trigger message: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function isLegacyMessage(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'request_id' in payload;
}

function normalize(
  message: TriggerMessageDto,
  defaults: TriggerDefaults,
): ProcessingRequestProps {
  if ('request_id' in message) {
    const { bucket, key } = parseS3Uri(message.s3_path);
    return {
      requestId: message.request_id,
      sourceBucket: bucket,
      sourceKey: key,
      notificationTarget: defaults.notificationQueueUrl,
    };
  }

  const source = message.sourceFileKey.startsWith('s3://')
    ? parseS3Uri(message.sourceFileKey)
    : { bucket: defaults.inputBucket, key: message.sourceFileKey.replace(/^\/+/, '') };

  return {
    requestId: message.id,
    sourceBucket: source.bucket,
    sourceKey: source.key,
    notificationTarget: message.notificationTarget ?? defaults.notificationQueueUrl,
  };
}
