/**
 * Error taxonomy.
 *
 * AppError subclasses are caller-visible: the error handler middleware maps
 * them to a status code and a JSON body. PipelineError subclasses stay inside
 * the analysis pipeline, where each one triggers a fallback or a degraded
 * result and never reaches the caller raw.
 */

import type { SourceEngine } from './types/models.js';

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message, 404);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super('PAYLOAD_TOO_LARGE', `Request body exceeds ${maxBytes} bytes`, 413, { maxBytes });
  }
}

/** Malformed, oversized or empty image. Rejected before any external call. */
export class InvalidInputError extends AppError {
  constructor(reason: string) {
    super(
      'INVALID_INPUT',
      `Please resend a valid photo of the affected leaf or fruit. ${reason}`,
      400,
      { reason }
    );
  }
}

/** Every analyzer stage failed. The only fatal pipeline outcome. */
export class AnalysisUnavailableError extends AppError {
  constructor(readonly attempts: Array<{ engine: SourceEngine; error: string }>) {
    super(
      'ANALYSIS_UNAVAILABLE',
      'Diagnosis service is temporarily unavailable, please try again shortly',
      503,
      { retryable: true }
    );
  }
}

// ── Pipeline-internal ──

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One analyzer stage failed: transport, timeout, authorization or parse. */
export class AnalyzerError extends PipelineError {
  constructor(
    readonly engine: SourceEngine,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${engine}] ${message}`, options);
  }
}

export class TimeoutError extends PipelineError {
  constructor(readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class TranslationError extends PipelineError {}

export class SynthesisError extends PipelineError {}

export class StorageError extends PipelineError {}

export class StoreError extends PipelineError {}

/** Malformed or inconsistent disease catalog. Fatal at startup. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
