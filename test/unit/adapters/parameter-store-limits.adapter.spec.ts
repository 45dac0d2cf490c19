import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ParameterStoreLimitsAdapter } from '../../../src/infrastructure/adapters/config/parameter-store-limits.adapter';
import { SsmService } from '../../../src/shared/aws/ssm/ssm.service';
import { AppConfig } from '../../../src/config/configuration';
import { ConfigurationError } from '../../../src/shared/errors';
import {
  createTestConfig,
  createTestConfigService,
  createTestLogger,
} from '../helpers/mock-factories';

const MAX_FRAMES_PARAMETER = '/video-frame-extractor/max-frames';
const TIMEOUT_PARAMETER = '/video-frame-extractor/timeout-ms';
const LOW_DISK_BYTES = 50 * 1024 * 1024;

describe('ParameterStoreLimitsAdapter', () => {
  let ssmService: SsmService;

  const createAdapter = (config: AppConfig) => {
    const configService = createTestConfigService(config);
    ssmService = new SsmService(configService, createTestLogger());
    return new ParameterStoreLimitsAdapter(ssmService, configService, createTestLogger());
  };

  const withParameters = createTestConfig({
    ssm: {
      maxFramesParameter: MAX_FRAMES_PARAMETER,
      timeoutParameter: TIMEOUT_PARAMETER,
      cacheTtlMs: 60000,
    },
    extraction: { maxFrames: 100, timeoutMs: 240000, lowDiskThresholdBytes: LOW_DISK_BYTES },
  });

  let adapter: ParameterStoreLimitsAdapter;

  const stubParameters = (values: Record<string, string | null>) =>
    vi
      .spyOn(ssmService, 'getParameter')
      .mockImplementation(async (name: string) => values[name] ?? null);

  beforeEach(() => {
    adapter = createAdapter(withParameters);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should take frame cap and timeout from Parameter Store', async () => {
    stubParameters({ [MAX_FRAMES_PARAMETER]: '25', [TIMEOUT_PARAMETER]: '60000' });

    await expect(adapter.resolve()).resolves.toEqual({
      maxFrames: 25,
      timeoutMs: 60000,
      lowDiskThresholdBytes: LOW_DISK_BYTES,
    });
  });

  it('should fall back to environment defaults for missing parameters', async () => {
    stubParameters({});

    await expect(adapter.resolve()).resolves.toEqual({
      maxFrames: 100,
      timeoutMs: 240000,
      lowDiskThresholdBytes: LOW_DISK_BYTES,
    });
  });

  it('should accept surrounding whitespace and a zero frame cap', async () => {
    stubParameters({ [MAX_FRAMES_PARAMETER]: '0', [TIMEOUT_PARAMETER]: ' 1500 ' });

    await expect(adapter.resolve()).resolves.toEqual({
      maxFrames: 0,
      timeoutMs: 1500,
      lowDiskThresholdBytes: LOW_DISK_BYTES,
    });
  });

  it('should not call Parameter Store when no parameter names are configured', async () => {
    adapter = createAdapter(createTestConfig());
    const getParameter = stubParameters({});

    const limits = await adapter.resolve();

    expect(getParameter).not.toHaveBeenCalled();
    expect(limits).toStrictEqual({ timeoutMs: 240000, lowDiskThresholdBytes: LOW_DISK_BYTES });
  });

  it('should reject a non-numeric frame cap', async () => {
    stubParameters({ [MAX_FRAMES_PARAMETER]: 'lots' });

    await expect(adapter.resolve()).rejects.toThrow(ConfigurationError);
  });

  it('should reject a zero timeout', async () => {
    stubParameters({ [TIMEOUT_PARAMETER]: '0' });

    await expect(adapter.resolve()).rejects.toThrow(
      `Invalid value for parameter ${TIMEOUT_PARAMETER}: "0" must be greater than zero`,
    );
  });

  it('should propagate Parameter Store failures other than a missing parameter', async () => {
    const throttled = new Error('Rate exceeded');
    vi.spyOn(ssmService, 'getParameter').mockRejectedValue(throttled);

    await expect(adapter.resolve()).rejects.toBe(throttled);
  });
});
