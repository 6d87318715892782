/**
 * Pipeline Error Taxonomy
 *
 * Errors raised inside the pipeline. None of them reaches the caller of
 * extractFinancials: the pipeline turns each into a structured Diagnostic.
 */

import type { Diagnostic, DiagnosticCode } from './types';

export class PipelineError extends Error {
  public readonly code: DiagnosticCode;
  /** Whether another attempt may succeed */
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: DiagnosticCode,
    retryable: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = retryable;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toDiagnostic(): Diagnostic {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_FORMAT', false, details);
  }
}

export class NoFinancialContentError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NO_FINANCIAL_CONTENT', false, details);
  }
}

export class ExtractionTimeoutError extends PipelineError {
  constructor(timeoutMs: number, details?: Record<string, unknown>) {
    super(`Model call exceeded ${timeoutMs}ms`, 'EXTRACTION_TIMEOUT', true, { timeoutMs, ...details });
  }
}

export class RateLimitedError extends PipelineError {
  constructor(message: string = 'Model provider rate limit reached', details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_FAILURE', true, { rateLimited: true, ...details });
  }
}

export class TransportFailureError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_FAILURE', true, details);
  }
}

export class ModelRequestError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MODEL_REQUEST_FAILED', false, details);
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string = 'Extraction cancelled') {
    super(message, 'CANCELLED', false);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
