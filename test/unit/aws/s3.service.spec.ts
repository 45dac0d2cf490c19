import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { PutObjectCommand } from '@aws-sdk/client-s3';
import type { GetObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import {
  DEFAULT_UPLOAD_URL_EXPIRY_SECONDS,
  S3Service,
} from '../../../src/shared/aws/s3/s3.service';
import { createTestConfigService, createTestLogger } from '../helpers/mock-factories';

interface GetObjectStub {
  Body?: unknown;
  ContentType?: string;
  ETag?: string;
}

const mocks = vi.hoisted(() => {
  const uploadParams: Array<Record<string, unknown>> = [];
  return {
    send: vi.fn<(command: GetObjectCommand) => Promise<GetObjectStub>>(),
    uploadParams,
    uploadDone: vi.fn<() => Promise<{ ETag?: string }>>(),
  };
});

vi.mock('@aws-sdk/client-s3', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-s3')>();
  return {
    ...actual,
    S3Client: class {
      send = mocks.send;
      destroy() {}
    },
  };
});

vi.mock('@aws-sdk/lib-storage', () => ({
  Upload: class {
    constructor(options: { params: Record<string, unknown> }) {
      mocks.uploadParams.push(options.params);
    }
    on() {
      return this;
    }
    done() {
      return mocks.uploadDone();
    }
  },
}));

vi.mock('@aws-sdk/s3-request-presigner', () => ({
  getSignedUrl: vi.fn(),
}));

describe('S3Service', () => {
  let workDir: string;
  let service: S3Service;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 's3-service-'));
    service = new S3Service(createTestConfigService(), createTestLogger());
  });

  afterEach(async () => {
    mocks.send.mockReset();
    mocks.uploadDone.mockReset();
    mocks.uploadParams.length = 0;
    vi.mocked(getSignedUrl).mockReset();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('downloadToFile', () => {
    it('should stream the object body to disk', async () => {
      mocks.send.mockResolvedValue({
        Body: Readable.from([Buffer.from('video-'), Buffer.from('bytes')]),
        ContentType: 'video/mp4',
        ETag: '"etag-1"',
      });
      const destPath = join(workDir, 'sample.mp4');

      const result = await service.downloadToFile('input-bucket', 'uploads/sample.mp4', destPath);

      expect(result).toEqual({
        filePath: destPath,
        size: 11,
        contentType: 'video/mp4',
        etag: '"etag-1"',
      });
      expect(await fs.readFile(destPath, 'utf-8')).toBe('video-bytes');
      expect(mocks.send.mock.calls[0][0].input).toEqual({
        Bucket: 'input-bucket',
        Key: 'uploads/sample.mp4',
      });
    });

    it('should reject a response without a readable body', async () => {
      mocks.send.mockResolvedValue({});

      await expect(
        service.downloadToFile('input-bucket', 'uploads/sample.mp4', join(workDir, 'x.mp4')),
      ).rejects.toThrow('Object s3://input-bucket/uploads/sample.mp4 returned no readable body');
    });
  });

  describe('uploadFile', () => {
    it('should upload the file with content type and metadata', async () => {
      const filePath = join(workDir, 'sample_frames.zip');
      await fs.writeFile(filePath, 'zip-bytes');
      mocks.uploadDone.mockResolvedValue({ ETag: '"etag-2"' });

      const result = await service.uploadFile('output-bucket', 'a/sample_frames.zip', filePath, {
        contentType: 'application/zip',
        metadata: { requestId: 'req-123' },
      });

      expect(result).toEqual({ key: 'a/sample_frames.zip', etag: '"etag-2"', size: 9 });
      expect(mocks.uploadParams).toHaveLength(1);
      expect(mocks.uploadParams[0]).toMatchObject({
        Bucket: 'output-bucket',
        Key: 'a/sample_frames.zip',
        ContentType: 'application/zip',
        Metadata: { requestId: 'req-123' },
      });
    });
  });

  describe('getSignedUploadUrl', () => {
    it('should sign a PUT for seven days by default', async () => {
      vi.mocked(getSignedUrl).mockResolvedValue('https://signed.example/upload');

      const url = await service.getSignedUploadUrl('input-bucket', 'uploads/new.mp4', 'video/mp4');

      expect(url).toBe('https://signed.example/upload');
      expect(DEFAULT_UPLOAD_URL_EXPIRY_SECONDS).toBe(604800);

      const [, command, options] = vi.mocked(getSignedUrl).mock.calls[0];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command).toMatchObject({
        input: { Bucket: 'input-bucket', Key: 'uploads/new.mp4', ContentType: 'video/mp4' },
      });
      expect(options).toEqual({ expiresIn: 604800 });
    });

    it('should honour a custom expiry', async () => {
      vi.mocked(getSignedUrl).mockResolvedValue('https://signed.example/upload');

      await service.getSignedUploadUrl('input-bucket', 'uploads/new.mp4', 'video/mp4', 3600);

      expect(vi.mocked(getSignedUrl).mock.calls[0][2]).toEqual({ expiresIn: 3600 });
    });
  });
});
