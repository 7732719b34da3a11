// src/core/errors.ts
import { ErrorCode, type ExportError } from './export/types.js';

export { ErrorCode };

export class SnapError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SnapError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function toExportError(error: SnapError): ExportError {
  return {
    code: error.code,
    message: error.message,
    retryable: error.retryable,
    suggestion: error.suggestion,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line (or two-line, with a suggestion) rendering for the CLI.
 */
export function formatError(error: unknown): string {
  if (error instanceof SnapError) {
    const head = `[${error.code}] ${error.message}`;
    return error.suggestion ? `${head}\nSuggestion: ${error.suggestion}` : head;
  }
  return errorMessage(error);
}
