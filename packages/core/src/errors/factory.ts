/**
 * Error factory functions for common errors
 */

import { isRecord } from '../utils/guards.js';
import { SonarError, SonarErrorCode } from './sonar-error.js';

/** Statuses retried by default: throttling and transient server failures */
export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

interface HttpErrorContext {
  body?: unknown;
  retryAfterMs?: number | undefined;
  method?: string | undefined;
  path?: string | undefined;
}

/**
 * Pull a readable message out of a SonarQube error body.
 * SonarQube answers `{"errors":[{"msg":"..."}]}`; some proxies answer `{"message":"..."}`.
 */
export function extractErrorMessage(status: number, body: unknown): string {
  if (isRecord(body)) {
    const errors = body['errors'];
    if (Array.isArray(errors)) {
      const messages = errors
        .map((entry: unknown) => {
          if (typeof entry === 'string') return entry;
          if (isRecord(entry)) {
            const msg = entry['msg'];
            return typeof msg === 'string' ? msg : undefined;
          }
          return undefined;
        })
        .filter((msg): msg is string => msg !== undefined && msg.length > 0);
      if (messages.length > 0) {
        return messages.join('; ');
      }
    }
    const message = body['message'];
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
    // Non-JSON bodies arrive wrapped as { content, statusCode }
    const content = body['content'];
    if (typeof content === 'string' && content.trim().length > 0) {
      return `HTTP ${status}: ${content.trim().slice(0, 200)}`;
    }
  }
  if (typeof body === 'string' && body.trim().length > 0) {
    return `HTTP ${status}: ${body.trim().slice(0, 200)}`;
  }
  return `HTTP ${status} error`;
}

export const Errors = {
  /**
   * Classify an upstream HTTP error response
   */
  fromStatus(status: number, context: HttpErrorContext = {}): SonarError {
    const message = extractErrorMessage(status, context.body);
    const details: Record<string, unknown> = { status };
    if (context.method) details['method'] = context.method;
    if (context.path) details['path'] = context.path;
    const base = {
      message,
      status,
      body: context.body,
      details,
      retryable: DEFAULT_RETRYABLE_STATUS_CODES.includes(status),
    };

    switch (status) {
      case 400:
      case 422:
        return new SonarError({
          ...base,
          code: SonarErrorCode.VALIDATION_FAILED,
          recovery: { suggestion: 'Check the request parameters against the SonarQube Web API documentation' },
        });
      case 401:
        return new SonarError({
          ...base,
          code: SonarErrorCode.AUTHENTICATION_FAILED,
          recovery: { suggestion: 'Check that SONARQUBE_TOKEN is set and has not expired or been revoked' },
        });
      case 403:
        return new SonarError({
          ...base,
          code: SonarErrorCode.AUTHORIZATION_FAILED,
          recovery: { suggestion: 'The token lacks permission for this resource; use a token with Browse rights' },
        });
      case 404:
        return new SonarError({
          ...base,
          code: SonarErrorCode.NOT_FOUND,
          recovery: { suggestion: 'Check that the project or component key exists' },
        });
      case 409:
        return new SonarError({
          ...base,
          code: SonarErrorCode.CONFLICT,
          recovery: { suggestion: 'The resource changed or already exists; reload it before retrying' },
        });
      case 429:
        return new SonarError({
          ...base,
          code: SonarErrorCode.RATE_LIMITED,
          retryAfterMs: context.retryAfterMs,
          recovery: {
            suggestion: 'SonarQube is throttling requests. Wait before retrying',
            retryAfterMs: context.retryAfterMs,
          },
        });
    }

    if (status >= 500) {
      return new SonarError({
        ...base,
        code: SonarErrorCode.UPSTREAM_SERVER_ERROR,
        recovery: { suggestion: 'SonarQube is failing; try again later or check the server logs' },
      });
    }

    return new SonarError({
      ...base,
      code: SonarErrorCode.REQUEST_REJECTED,
    });
  },

  network(message: string, cause?: unknown): SonarError {
    return new SonarError({
      code: SonarErrorCode.NETWORK_ERROR,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
      recovery: { suggestion: 'Check that SONARQUBE_URL is reachable from this host' },
    });
  },

  timeout(message: string, cause?: unknown): SonarError {
    return new SonarError({
      code: SonarErrorCode.TIMEOUT,
      message,
      retryable: true,
      cause,
      recovery: { suggestion: 'SonarQube answered too slowly; raise REQUEST_TIMEOUT or retry later' },
    });
  },

  /**
   * A caller gave up waiting for a shared fetch. The fetch itself keeps running.
   */
  waitTimeout(key: string, timeoutMs: number): SonarError {
    return new SonarError({
      code: SonarErrorCode.TIMEOUT,
      message: `Timed out after ${timeoutMs}ms waiting for ${key}`,
      retryable: false,
      details: { key, timeoutMs },
      recovery: { suggestion: 'The fetch is still running; call again shortly to read the cached result' },
    });
  },

  /**
   * The local token bucket could not grant a token in time
   */
  rateLimitBudgetExhausted(timeoutMs: number): SonarError {
    return new SonarError({
      code: SonarErrorCode.RATE_LIMITED,
      message: `Local rate limit budget exhausted: no token available within ${timeoutMs}ms`,
      retryable: false,
      details: { timeoutMs },
      recovery: { suggestion: 'Wait before making more requests', retryAfterMs: timeoutMs },
    });
  },

  unknownResourceType(resourceType: string, knownTypes: string[]): SonarError {
    return new SonarError({
      code: SonarErrorCode.UNKNOWN_RESOURCE_TYPE,
      message: `Unknown resource type: ${resourceType}`,
      retryable: false,
      details: { provided: resourceType, valid: knownTypes },
      recovery: { suggestion: `Use one of: ${knownTypes.join(', ')}` },
    });
  },

  invalidConfiguration(issues: string[]): SonarError {
    return new SonarError({
      code: SonarErrorCode.INVALID_CONFIGURATION,
      message: `Invalid configuration: ${issues.join('; ')}`,
      retryable: false,
      details: { issues },
    });
  },

  invalidArgument(param: string, reason: string): SonarError {
    return new SonarError({
      code: SonarErrorCode.INVALID_ARGUMENT,
      message: `Invalid argument '${param}': ${reason}`,
      retryable: false,
      details: { param, reason },
    });
  },

  validation(field: string, reason: string): SonarError {
    return new SonarError({
      code: SonarErrorCode.VALIDATION_FAILED,
      message: `Invalid ${field}: ${reason}`,
      retryable: false,
      details: { field, reason },
    });
  },

  internal(message: string, cause?: unknown): SonarError {
    return new SonarError({
      code: SonarErrorCode.INTERNAL_ERROR,
      message: `Internal error: ${message}`,
      retryable: false,
      cause,
      recovery: { suggestion: 'This is an unexpected error. Please report it if it persists.' },
    });
  },
};

/**
 * Convert anything thrown into a SonarError. Unclassified errors are fatal.
 */
export function toSonarError(error: unknown): SonarError {
  if (error instanceof SonarError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return Errors.internal(message, error);
}
