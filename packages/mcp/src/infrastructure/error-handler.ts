/**
 * MCP Error Handler
 *
 * Turns anything a tool handler throws into a structured tool result:
 * - Consistent error codes from the data-access layer
 * - Recovery suggestions for AI clients
 * - Request tracking
 */

import { ZodError } from 'zod';
import { SonarErrorCode, toSonarError, type RecoveryHint } from 'sonargate-core';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean | undefined;
}

export interface ToolErrorBody {
  error: {
    code: string;
    message: string;
    status?: number | undefined;
    attempts?: number | undefined;
    retryAfterMs?: number | undefined;
    details?: Record<string, unknown> | undefined;
    recovery?: RecoveryHint | undefined;
  };
  meta: {
    requestId: string;
    timestamp: string;
  };
}

function createRequestId(now: number = Date.now()): string {
  return `err_${now.toString(36)}`;
}

/**
 * Error handler middleware
 */
export function handleError(error: unknown, requestId?: string): ToolResult & { isError: true } {
  const body: ToolErrorBody = {
    error: describeError(error),
    meta: {
      requestId: requestId ?? createRequestId(),
      timestamp: new Date().toISOString(),
    },
  };

  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
    isError: true,
  };
}

export function describeError(error: unknown): ToolErrorBody['error'] {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    });
    return {
      code: SonarErrorCode.INVALID_ARGUMENT,
      message: `Invalid arguments: ${issues.join('; ')}`,
      details: { issues },
      recovery: { suggestion: 'Check the tool input schema and call again' },
    };
  }

  const sonarError = toSonarError(error);
  return {
    code: sonarError.code,
    message: sonarError.message,
    status: sonarError.status,
    attempts: sonarError.attempts,
    retryAfterMs: sonarError.retryAfterMs,
    details: sonarError.details,
    recovery: sonarError.recovery,
  };
}
