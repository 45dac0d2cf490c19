import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ExtractionError,
  NotificationError,
  PackagingError,
  TransferError,
  TriggerDecodeError,
  VideoProcessingError,
  errorMessage,
} from '../../../src/shared/errors';

describe('video processing errors', () => {
  it.each([
    [new ExtractionError('x'), 'ExtractionError', 'EXTRACTION_FAILED', false],
    [
      new TransferError('x', { bucket: 'b', key: 'k' }),
      'TransferError',
      'TRANSFER_FAILED',
      true,
    ],
    [new PackagingError('x'), 'PackagingError', 'PACKAGING_FAILED', false],
    [new NotificationError('x'), 'NotificationError', 'NOTIFICATION_FAILED', true],
    [new ConfigurationError('x'), 'ConfigurationError', 'CONFIGURATION_INVALID', false],
    [new TriggerDecodeError('x'), 'TriggerDecodeError', 'TRIGGER_DECODE_FAILED', false],
  ])('%s should carry its name, code and retryability', (error, name, code, retryable) => {
    expect(error).toBeInstanceOf(VideoProcessingError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.retryable).toBe(retryable);
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');

    expect(new NotificationError('send failed', { cause }).cause).toBe(cause);
  });

  it('should serialize code and details', () => {
    const error = new ExtractionError('Cannot open video source', {
      details: { sourcePath: '/tmp/a.mp4' },
    });

    expect(error.toJSON()).toEqual({
      name: 'ExtractionError',
      code: 'EXTRACTION_FAILED',
      message: 'Cannot open video source',
      retryable: false,
      details: { sourcePath: '/tmp/a.mp4' },
    });
  });

  it('should expose transfer target and reason', () => {
    const error = new TransferError('denied', {
      bucket: 'input-bucket',
      key: 'a.mp4',
      reason: 'AccessDenied',
    });

    expect(error).toMatchObject({ bucket: 'input-bucket', key: 'a.mp4', reason: 'AccessDenied' });
  });

  it('should describe unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
