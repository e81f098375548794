export type PipelineErrorCode =
  | 'MALFORMED_SEGMENT'
  | 'TRANSCRIPT_FORMAT'
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'PROVIDER';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details?: string[];

  constructor(message: string, code: PipelineErrorCode, details?: string[]) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'PipelineError';

    Error.captureStackTrace(this, this.constructor);
  }
}

export class MalformedSegmentError extends PipelineError {
  public readonly segmentIndex: number;

  constructor(message: string, segmentIndex: number) {
    super(message, 'MALFORMED_SEGMENT');
    this.segmentIndex = segmentIndex;
    this.name = 'MalformedSegmentError';
  }
}

export class TranscriptFormatError extends PipelineError {
  public readonly lineNumber: number;

  constructor(message: string, lineNumber: number) {
    super(`${message} (line ${lineNumber})`, 'TRANSCRIPT_FORMAT');
    this.lineNumber = lineNumber;
    this.name = 'TranscriptFormatError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: string[]) {
    super(message, 'CONFIGURATION', details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, details?: string[]) {
    super(message, 'VALIDATION', details);
    this.name = 'ValidationError';
  }
}

export class ProviderError extends PipelineError {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider}: ${message}`, 'PROVIDER');
    this.provider = provider;
    this.status = status;
    this.name = 'ProviderError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
