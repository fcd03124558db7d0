export type AnalysisErrorKind =
  | 'InvalidInput'
  | 'NotAPdf'
  | 'DownloadFailure'
  | 'ExtractionFailure'
  | 'Timeout'
  | 'ProviderAuthFailure'
  | 'ProviderTransientFailure'
  | 'ProviderResponseFailure'
  | 'ProviderExhausted'
  | 'ResponseUnparseable'
  | 'SchemaViolation';

/**
 * Base class of every typed failure raised by the analysis pipeline.
 *
 * Never carries credentials or raw tokens; messages may include truncated
 * upstream text.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  readonly timestamp: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      kind: this.kind,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
