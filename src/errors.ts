export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, refused connections and other transport failures. */
export class NetworkError extends RelayError {}

export class RateLimitError extends RelayError {
  constructor(message: string, readonly retryAfter: number | null = null) {
    super(message);
  }
}

export class ServerError extends RelayError {
  constructor(message: string, readonly statusCode: number) {
    super(message);
  }
}

/** The source says the post does not exist. Never retried. */
export class NotFoundError extends RelayError {}

export class PublishError extends RelayError {}

export class StatusNotFoundError extends PublishError {}

export class EditNotAllowedError extends PublishError {}

export class ValidationError extends PublishError {}

export class StateError extends RelayError {}

export type ErrorCode =
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'SERVER_ERROR'
  | 'UNAUTHORIZED'
  | 'EDIT_NOT_ALLOWED'
  | 'VALIDATION'
  | 'STATE'
  | 'PARSE_ERROR'
  | 'UNKNOWN';

export type ClassifiedError = {
  code: ErrorCode;
  retryable: boolean;
  message: string;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyError(error: unknown): ClassifiedError {
  const message = errorMessage(error);

  if (error instanceof NotFoundError || error instanceof StatusNotFoundError) {
    return { code: 'NOT_FOUND', retryable: false, message };
  }
  if (error instanceof RateLimitError) return { code: 'RATE_LIMITED', retryable: true, message };
  if (error instanceof NetworkError) return { code: 'TIMEOUT', retryable: true, message };
  if (error instanceof ServerError) return { code: 'SERVER_ERROR', retryable: true, message };
  if (error instanceof EditNotAllowedError) return { code: 'EDIT_NOT_ALLOWED', retryable: false, message };
  if (error instanceof ValidationError) return { code: 'VALIDATION', retryable: false, message };
  if (error instanceof StateError) return { code: 'STATE', retryable: false, message };

  const lower = message.toLowerCase();

  if (lower.includes('429') || lower.includes('rate limit')) {
    return { code: 'RATE_LIMITED', retryable: true, message };
  }

  if (lower.includes('timeout') || lower.includes('timed out') || lower.includes('network') || lower.includes('econnreset')) {
    return { code: 'TIMEOUT', retryable: true, message };
  }

  if (lower.includes('404') || lower.includes('not found') || lower.includes('deleted')) {
    return { code: 'NOT_FOUND', retryable: false, message };
  }

  if (lower.includes('401') || lower.includes('403') || lower.includes('unauthorized')) {
    return { code: 'UNAUTHORIZED', retryable: false, message };
  }

  if (lower.includes('parse')) {
    return { code: 'PARSE_ERROR', retryable: true, message };
  }

  return { code: 'UNKNOWN', retryable: true, message };
}

/**
 * Map a non-2xx HTTP status to the matching error class.
 */
export function httpError(status: number, context: string, retryAfterHeader?: string | null): RelayError {
  const message = `${context} failed: HTTP ${status}`;
  if (status === 404) return new NotFoundError(message);
  if (status === 429) {
    const seconds = retryAfterHeader ? Number.parseInt(retryAfterHeader, 10) : Number.NaN;
    return new RateLimitError(message, Number.isNaN(seconds) ? null : seconds);
  }
  if (status >= 500) return new ServerError(message, status);
  return new RelayError(message);
}
