import {
  AnalysisError,
  AnalysisErrorKind,
  errorMessage,
} from '../../utils/analysis-error';

const BODY_PREVIEW_LENGTH = 200;

/** Statuses worth retrying on the same provider. */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([
  408, 425, 429, 500, 502, 503, 504, 529,
]);
export const AUTH_STATUSES: ReadonlySet<number> = new Set([401, 403]);

const TRANSIENT_MESSAGE_RE = /unavailable|overloaded|rate limit/i;

export class ProviderAuthError extends AnalysisError {
  readonly kind = 'ProviderAuthFailure' as const;

  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
  ) {
    super(`${provider}: ${message}`);
  }
}

/** Rate limits, overload, timeouts and network failures. */
export class ProviderTransientError extends AnalysisError {
  readonly kind = 'ProviderTransientFailure' as const;

  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

/** Empty or malformed content and any other non-retryable failure. */
export class ProviderResponseError extends AnalysisError {
  readonly kind = 'ProviderResponseFailure' as const;

  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
  ) {
    super(`${provider}: ${message}`);
  }
}

export type ProviderError =
  | ProviderAuthError
  | ProviderTransientError
  | ProviderResponseError;

export interface ProviderAttempt {
  provider: string;
  kind: AnalysisErrorKind;
  message: string;
}

export class ProviderExhaustedError extends AnalysisError {
  readonly kind = 'ProviderExhausted' as const;

  constructor(
    message: string,
    readonly attempts: ProviderAttempt[] = [],
  ) {
    super(message);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), attempts: this.attempts };
  }
}

export const isProviderError = (error: unknown): error is ProviderError =>
  error instanceof ProviderAuthError ||
  error instanceof ProviderTransientError ||
  error instanceof ProviderResponseError;

/**
 * Classify a failed HTTP response.
 * Auth for 401/403, transient for the retryable statuses or overload
 * wording in the body, response error otherwise.
 */
export async function providerErrorFromResponse(
  provider: string,
  response: Response,
): Promise<ProviderError> {
  let detail: string;
  try {
    detail = (await response.text()).slice(0, BODY_PREVIEW_LENGTH);
  } catch {
    detail = response.statusText;
  }
  const message = `HTTP ${response.status}${detail ? ` - ${detail}` : ''}`;

  if (AUTH_STATUSES.has(response.status)) {
    return new ProviderAuthError(provider, message, response.status);
  }
  if (
    TRANSIENT_STATUSES.has(response.status) ||
    TRANSIENT_MESSAGE_RE.test(detail)
  ) {
    return new ProviderTransientError(provider, message, response.status);
  }
  return new ProviderResponseError(provider, message, response.status);
}

/** Network failures and aborted requests are transient. */
export function providerErrorFromNetworkError(
  provider: string,
  error: unknown,
): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  const name = error instanceof Error ? error.name : '';
  const message =
    name === 'TimeoutError' || name === 'AbortError'
      ? 'request timed out'
      : `network error: ${errorMessage(error)}`;
  return new ProviderTransientError(provider, message, undefined, {
    cause: error,
  });
}
