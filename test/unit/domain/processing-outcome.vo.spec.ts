import { describe, it, expect } from 'vitest';
import {
  ProcessingOutcome,
  ProcessingStatus,
} from '../../../src/domain/value-objects/processing-outcome.vo';

describe('ProcessingOutcome', () => {
  it('should carry the location only for success', () => {
    const success = ProcessingOutcome.success('s3://bucket/key.zip');

    expect(success.status).toBe(ProcessingStatus.SUCCESS);
    expect(success.resultLocation).toBe('s3://bucket/key.zip');
  });

  it('should have an empty location for the other outcomes', () => {
    const noFrames = ProcessingOutcome.noFramesExtracted();
    const failure = ProcessingOutcome.failure();

    expect(noFrames.status).toBe(ProcessingStatus.NO_FRAMES_EXTRACTED);
    expect(noFrames.resultLocation).toBe('');
    expect(failure.status).toBe(ProcessingStatus.FAILURE);
    expect(failure.resultLocation).toBe('');
  });

  it('should refuse a success without a location', () => {
    expect(() => ProcessingOutcome.success('')).toThrow(
      'A successful outcome requires a result location',
    );
  });
});
