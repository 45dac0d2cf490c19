/**
 * Processing Outcome Value Object
 * The single terminal result communicated for a request.
 */
export enum ProcessingStatus {
  SUCCESS = 'SUCCESS',
  NO_FRAMES_EXTRACTED = 'NO_FRAMES_EXTRACTED',
  FAILURE = 'FAILURE',
}

export class ProcessingOutcome {
  private constructor(
    private readonly _status: ProcessingStatus,
    private readonly _resultLocation: string,
  ) {}

  static success(resultLocation: string): ProcessingOutcome {
    if (!resultLocation) {
      throw new Error('A successful outcome requires a result location');
    }
    return new ProcessingOutcome(ProcessingStatus.SUCCESS, resultLocation);
  }

  static noFramesExtracted(): ProcessingOutcome {
    return new ProcessingOutcome(ProcessingStatus.NO_FRAMES_EXTRACTED, '');
  }

  static failure(): ProcessingOutcome {
    return new ProcessingOutcome(ProcessingStatus.FAILURE, '');
  }

  get status(): ProcessingStatus {
    return this._status;
  }

  /** Empty unless the status is SUCCESS. */
  get resultLocation(): string {
    return this._resultLocation;
  }
}
