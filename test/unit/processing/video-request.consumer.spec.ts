import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { Message } from '@aws-sdk/client-sqs';
import { VideoRequestConsumer } from '../../../src/processing/consumers/video-request.consumer';
import { ProcessVideoUseCase } from '../../../src/application/use-cases/process-video.use-case';
import { FrameExtractorService } from '../../../src/application/services/frame-extractor.service';
import { ExtractionLimitsPort } from '../../../src/application/ports/output/extraction-limits.port';
import { ZipArchiveBuilderAdapter } from '../../../src/infrastructure/adapters/archive/zip-archive-builder.adapter';
import { ConfigurationError, TriggerDecodeError, TransferError } from '../../../src/shared/errors';
import {
  FixedDiskSpaceAdapter,
  InMemoryFileStorageAdapter,
  InMemoryFrameSourceAdapter,
  InMemoryNotifierAdapter,
} from '../../in-memory-adapters';
import {
  TEST_QUEUE_URL,
  createTestConfigService,
  createTestLimits,
  createTestLogger,
} from '../helpers/mock-factories';

describe('VideoRequestConsumer', () => {
  let notifier: InMemoryNotifierAdapter;
  let useCase: ProcessVideoUseCase;
  let extractionLimits: { resolve: Mock<ExtractionLimitsPort['resolve']> };
  let consumer: VideoRequestConsumer;

  const limits = createTestLimits({ maxFrames: 5 });

  const message = (body: unknown): Message => ({
    MessageId: 'msg-1',
    Body: typeof body === 'string' ? body : JSON.stringify(body),
  });

  beforeEach(() => {
    const configService = createTestConfigService();
    notifier = new InMemoryNotifierAdapter();

    useCase = new ProcessVideoUseCase(
      new InMemoryFileStorageAdapter(),
      new ZipArchiveBuilderAdapter(createTestLogger()),
      notifier,
      new FrameExtractorService(
        new InMemoryFrameSourceAdapter(),
        new FixedDiskSpaceAdapter(),
        createTestLogger(),
      ),
      configService,
      createTestLogger(),
    );

    extractionLimits = { resolve: vi.fn<ExtractionLimitsPort['resolve']>() };
    extractionLimits.resolve.mockResolvedValue(limits);

    consumer = new VideoRequestConsumer(
      useCase,
      extractionLimits,
      configService,
      createTestLogger(),
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run the use case with the decoded request and resolved limits', async () => {
    const execute = vi.spyOn(useCase, 'execute').mockResolvedValue(undefined);

    await consumer.handleMessage(message({ id: 'req-1', sourceFileKey: 'uploads/clip.mp4' }));

    expect(extractionLimits.resolve).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledTimes(1);
    const [request, passedLimits] = execute.mock.calls[0];
    expect(request.toJSON()).toEqual({
      requestId: 'req-1',
      sourceBucket: 'input-bucket',
      sourceKey: 'uploads/clip.mp4',
      notificationTarget: TEST_QUEUE_URL,
    });
    expect(passedLimits).toBe(limits);
  });

  it('should reject a malformed message before resolving limits', async () => {
    const execute = vi.spyOn(useCase, 'execute');

    await expect(consumer.handleMessage(message('{"id":'))).rejects.toThrow(TriggerDecodeError);

    expect(extractionLimits.resolve).not.toHaveBeenCalled();
    expect(execute).not.toHaveBeenCalled();
    expect(notifier.attempts).toEqual([]);
  });

  it('should propagate a configuration failure without notifying', async () => {
    const execute = vi.spyOn(useCase, 'execute');
    extractionLimits.resolve.mockRejectedValue(
      new ConfigurationError('Invalid value for parameter /max-frames'),
    );

    await expect(
      consumer.handleMessage(message({ id: 'req-2', sourceFileKey: 'clip.mp4' })),
    ).rejects.toThrow(ConfigurationError);

    expect(execute).not.toHaveBeenCalled();
    expect(notifier.attempts).toEqual([]);
  });

  it('should re-throw a processing failure so the message is redelivered', async () => {
    // The source object is absent from the in-memory store
    await expect(
      consumer.handleMessage(message({ id: 'req-3', sourceFileKey: 'missing.mp4' })),
    ).rejects.toThrow(TransferError);

    expect(notifier.sent.map((notification) => notification.body)).toEqual([
      { request_id: 'req-3', result_s3_path: '', status: 'FAILURE' },
    ]);
  });
});
