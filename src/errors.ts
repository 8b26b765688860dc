//errors thrown to pipeline callers; internal fallbacks use Result values instead

export enum PipelineErrorCode {
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  EXTRACTION_TIMEOUT = 'EXTRACTION_TIMEOUT',
  PERSISTENCE_FAILED = 'PERSISTENCE_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',
}

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

//the extraction collaborator failed or returned a payload that does not validate
export class ExtractionError extends PipelineError {
  constructor(message: string, code: PipelineErrorCode = PipelineErrorCode.EXTRACTION_FAILED, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ExtractionError';
  }
}

//the transcript or extraction record could not be written
export class PersistenceError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, PipelineErrorCode.PERSISTENCE_FAILED, details);
    this.name = 'PersistenceError';
  }
}
