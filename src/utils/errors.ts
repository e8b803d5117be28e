export type ErrorCode = 'TICKER_NOT_FOUND' | 'INSUFFICIENT_DATA' | 'MODEL_ERROR' | 'INTERNAL_ERROR';

export type ErrorPayload = {
  code: ErrorCode;
  message: string;
  retryable: boolean;
};

export abstract class AnalysisError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The provider says the ticker does not exist. Bad input, never retried. */
export class TickerNotFoundError extends AnalysisError {
  readonly code = 'TICKER_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly ticker: string, message = `No data found for ticker '${ticker}'`) {
    super(message);
  }
}

/** Transient provider failure: network, 5xx, timeout, malformed payload. */
export class DataProviderError extends AnalysisError {
  readonly code = 'INTERNAL_ERROR';
  readonly retryable = true;
}

export class InsufficientDataError extends AnalysisError {
  readonly code = 'INSUFFICIENT_DATA';
  readonly retryable = false;
}

export type NarrativeFailureReason = 'network' | 'timeout' | 'rate_limited' | 'empty' | 'api' | 'unavailable';

/** Recovered by the orchestrator through the rule-based fallback; never reaches callers. */
export class NarrativeServiceError extends AnalysisError {
  readonly code = 'MODEL_ERROR';
  readonly retryable = true;

  constructor(readonly reason: NarrativeFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Logged and treated as a cache miss. */
export class CacheStorageError extends AnalysisError {
  readonly code = 'INTERNAL_ERROR';
  readonly retryable = true;
}

export class RequestAbortedError extends AnalysisError {
  readonly code = 'INTERNAL_ERROR';
  readonly retryable = true;

  constructor(message = 'Request was aborted') {
    super(message);
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const toErrorPayload = (err: unknown): ErrorPayload => {
  if (err instanceof AnalysisError) {
    return { code: err.code, message: err.message, retryable: err.retryable };
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(err), retryable: false };
};
