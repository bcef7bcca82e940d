/**
 * Pipeline Error Types
 *
 * File-level failures are thrown as one of these and caught by the
 * orchestrator, which moves the file to FAILED and records `message`.
 * Row-level problems (conversion notes, validation violations) are never
 * thrown; they are collected as values.
 */

export { InvalidStatusTransitionError } from '../../shared/fileStatus';

export type PipelineErrorCode =
  | 'PIPELINE_ERROR'
  | 'DECODE_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'FILE_CLAIM_ERROR'
  | 'SUGGESTION_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: PipelineErrorCode = 'PIPELINE_ERROR', details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

/** Unsupported or corrupt input. Fatal for the file, never retried here. */
export class DecodeError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'DECODE_ERROR', details, options);
    this.name = 'DecodeError';
  }
}

/** A repository write failed. Fatal for the file. */
export class PersistenceError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', undefined, { cause });
    this.name = 'PersistenceError';
  }
}

/** The file's status changed underneath the current run. */
export class FileClaimError extends PipelineError {
  constructor(fileId: string, expectedStatus: string) {
    super(`File ${fileId} is no longer in status ${expectedStatus}`, 'FILE_CLAIM_ERROR', { fileId, expectedStatus });
    this.name = 'FileClaimError';
  }
}

/**
 * AI suggestion failure. Only ever caught inside the suggestion generator,
 * where it triggers the heuristic fallback.
 */
export class SuggestionGenerationError extends PipelineError {
  readonly reason: 'disabled' | 'timeout' | 'request_failed' | 'malformed_response' | 'empty_response';

  constructor(reason: SuggestionGenerationError['reason'], message: string, cause?: unknown) {
    super(message, 'SUGGESTION_FAILED', { reason }, { cause });
    this.name = 'SuggestionGenerationError';
    this.reason = reason;
  }
}

/** Invalid environment, rule set or template document. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(resource: string, id: string) {
    super(`${resource} ${id} not found`, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

/** The request conflicts with the current state (already reviewed, id taken). */
export class ConflictError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

/**
 * Message safe to store on the file record and return from the API.
 */
export function toFailureMessage(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.message;
  }
  if (error instanceof Error && error.name === 'InvalidStatusTransitionError') {
    return error.message;
  }
  if (error instanceof Error) {
    return `Unexpected internal error while processing file (${error.name})`;
  }
  return 'Unexpected internal error while processing file';
}
