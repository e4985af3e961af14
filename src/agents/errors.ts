export class TransportError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    cause?: unknown,
    public readonly status?: number
  ) {
    super(`${service} request failed: ${message}`);
    this.name = 'TransportError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class SchemaValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
    this.name = 'SchemaValidationError';
  }
}

export class ClassificationError extends Error {
  constructor(
    public readonly paperId: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(
      `Failed to classify paper ${paperId} after ${attempts} attempts: ${lastError.message}`
    );
    this.name = 'ClassificationError';
    this.cause = lastError;
  }
}
