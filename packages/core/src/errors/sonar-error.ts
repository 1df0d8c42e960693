/**
 * Classified Errors
 *
 * Every failure that leaves the data-access layer is a SonarError with:
 * - A stable error code
 * - A retryable/fatal classification used by the retry orchestrator
 * - The HTTP status and body when the upstream answered
 * - A recovery hint for AI clients
 */

export enum SonarErrorCode {
  // Upstream client errors (4xx)
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  AUTHORIZATION_FAILED = 'AUTHORIZATION_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  CONFLICT = 'CONFLICT',
  REQUEST_REJECTED = 'REQUEST_REJECTED',

  // Rate limiting (upstream 429 or local budget)
  RATE_LIMITED = 'RATE_LIMITED',

  // Transport and upstream server errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  UPSTREAM_SERVER_ERROR = 'UPSTREAM_SERVER_ERROR',

  // Local errors
  UNKNOWN_RESOURCE_TYPE = 'UNKNOWN_RESOURCE_TYPE',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface RecoveryHint {
  suggestion: string;
  retryAfterMs?: number | undefined;
}

export interface SonarErrorDetails {
  code: SonarErrorCode;
  message: string;
  retryable: boolean;
  status?: number | undefined;
  body?: unknown;
  retryAfterMs?: number | undefined;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
  cause?: unknown;
}

export class SonarError extends Error {
  public readonly code: SonarErrorCode;
  public readonly retryable: boolean;
  public readonly status?: number | undefined;
  public readonly body?: unknown;
  public readonly retryAfterMs?: number | undefined;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  /** Number of attempts made before this error was surfaced */
  public attempts = 1;

  constructor(errorDetails: SonarErrorDetails) {
    super(errorDetails.message, { cause: errorDetails.cause });
    this.name = 'SonarError';
    this.code = errorDetails.code;
    this.retryable = errorDetails.retryable;
    this.status = errorDetails.status;
    this.body = errorDetails.body;
    this.retryAfterMs = errorDetails.retryAfterMs;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }

  toJSON(): {
    code: SonarErrorCode;
    message: string;
    status?: number | undefined;
    attempts: number;
    retryAfterMs?: number | undefined;
    details?: Record<string, unknown> | undefined;
    recovery?: RecoveryHint | undefined;
  } {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      attempts: this.attempts,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
      recovery: this.recovery,
    };
  }
}
