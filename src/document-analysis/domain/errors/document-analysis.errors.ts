import { AnalysisError } from '../../../utils/analysis-error';

export class InvalidInputError extends AnalysisError {
  readonly kind = 'InvalidInput' as const;

  constructor(message: string) {
    super(message);
  }
}

/** Content does not start with the %PDF signature. */
export class NotAPdfError extends AnalysisError {
  readonly kind = 'NotAPdf' as const;

  constructor(message = 'Provided content is not a PDF (missing %PDF header)') {
    super(message);
  }
}

export class DownloadError extends AnalysisError {
  readonly kind = 'DownloadFailure' as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The PDF could not be opened or parsed. */
export class ExtractionError extends AnalysisError {
  readonly kind = 'ExtractionFailure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AnalysisTimeoutError extends AnalysisError {
  readonly kind = 'Timeout' as const;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Operation timed out during ${operation} after ${timeoutMs}ms`);
  }
}

/** Every step of the JSON repair ladder failed. */
export class ResponseUnparseableError extends AnalysisError {
  readonly kind = 'ResponseUnparseable' as const;

  constructor(
    message: string,
    readonly preview: string,
  ) {
    super(message);
  }
}

export class SchemaViolationError extends AnalysisError {
  readonly kind = 'SchemaViolation' as const;

  constructor(
    readonly violations: string[],
    subject = 'AnalysisResult',
  ) {
    super(`${subject} failed schema validation: ${violations.join('; ')}`);
  }
}
