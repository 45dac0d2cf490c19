/**
 * Processing Request Value Object
 * One accepted trigger message: which object to process and where to report.
 */
export interface ProcessingRequestProps {
  requestId: string;
  sourceBucket: string;
  sourceKey: string;
  notificationTarget: string;
}

export class ProcessingRequest {
  private constructor(private readonly props: Readonly<ProcessingRequestProps>) {
    Object.freeze(this);
  }

  static create(props: ProcessingRequestProps): ProcessingRequest {
    ProcessingRequest.validate(props);
    return new ProcessingRequest(Object.freeze({ ...props }));
  }

  private static validate(props: ProcessingRequestProps): void {
    const required: Array<keyof ProcessingRequestProps> = [
      'requestId',
      'sourceBucket',
      'sourceKey',
      'notificationTarget',
    ];

    for (const field of required) {
      if (!props[field] || props[field].trim().length === 0) {
        throw new Error(`${field} cannot be empty`);
      }
    }

    if (props.sourceKey.endsWith('/')) {
      throw new Error(`sourceKey must name an object, got prefix: ${props.sourceKey}`);
    }
  }

  get requestId(): string {
    return this.props.requestId;
  }

  get sourceBucket(): string {
    return this.props.sourceBucket;
  }

  get sourceKey(): string {
    return this.props.sourceKey;
  }

  get notificationTarget(): string {
    return this.props.notificationTarget;
  }

  get sourceUri(): string {
    return `s3://${this.props.sourceBucket}/${this.props.sourceKey}`;
  }

  equals(other: ProcessingRequest): boolean {
    return (
      this.requestId === other.requestId &&
      this.sourceBucket === other.sourceBucket &&
      this.sourceKey === other.sourceKey &&
      this.notificationTarget === other.notificationTarget
    );
  }

  toJSON(): ProcessingRequestProps {
    return { ...this.props };
  }
}
