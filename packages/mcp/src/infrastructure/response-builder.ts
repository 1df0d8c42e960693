/**
 * Response Builder
 *
 * Summary-first tool responses with optional hints for the AI client.
 */

import type { ToolResult } from './error-handler.js';

export interface MCPResponseMeta {
  requestId: string;
  durationMs: number;
}

export interface ResponseHints {
  nextActions?: string[] | undefined;
  warnings?: string[] | undefined;
}

export interface MCPResponse<T> {
  summary: string;
  data: T;
  hints?: ResponseHints | undefined;
  meta: MCPResponseMeta;
}

export class ResponseBuilder<T> {
  private summary = '';
  private data: { value: T } | null = null;
  private hints: ResponseHints = {};
  private readonly startTime: number;

  constructor(
    private readonly requestId: string,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now();
  }

  /**
   * Set the summary (1-2 sentences describing the response)
   */
  withSummary(summary: string): this {
    this.summary = summary;
    return this;
  }

  withData(data: T): this {
    this.data = { value: data };
    return this;
  }

  addNextAction(action: string): this {
    (this.hints.nextActions ??= []).push(action);
    return this;
  }

  addWarning(warning: string): this {
    (this.hints.warnings ??= []).push(warning);
    return this;
  }

  build(): MCPResponse<T> {
    if (this.data === null) {
      throw new Error('Response data is required');
    }
    if (!this.summary) {
      throw new Error('Response summary is required');
    }

    const response: MCPResponse<T> = {
      summary: this.summary,
      data: this.data.value,
      meta: {
        requestId: this.requestId,
        durationMs: this.now() - this.startTime,
      },
    };
    if (this.hints.nextActions !== undefined || this.hints.warnings !== undefined) {
      response.hints = this.hints;
    }
    return response;
  }

  /**
   * Build and wrap as an MCP tool result
   */
  buildContent(): ToolResult {
    return {
      content: [{ type: 'text', text: JSON.stringify(this.build(), null, 2) }],
    };
  }
}

export function createResponseBuilder<T>(requestId: string = `req_${Date.now().toString(36)}`): ResponseBuilder<T> {
  return new ResponseBuilder<T>(requestId);
}
