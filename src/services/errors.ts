/**
 * Pipeline Error Classes
 *
 * Every stage failure is one of these. The orchestrator reads `category` to
 * fill the failure envelope; ExecutionError is the only one it does not treat
 * as fatal.
 */

export type PipelineErrorCategory =
  | 'DOCUMENT_DECODE_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'SCORING_ERROR'
  | 'UPSTREAM_ERROR'
  | 'EXECUTION_ERROR';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** Uploaded bytes are not a document the rasterizer can read */
export class DocumentDecodeError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'DOCUMENT_DECODE_ERROR', details, options);
    this.name = 'DocumentDecodeError';
  }
}

/** A model-serving endpoint never answered its readiness probe */
export class ServiceUnavailableError extends PipelineError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly attempts: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'SERVICE_UNAVAILABLE', { endpoint, attempts, ...details });
    this.name = 'ServiceUnavailableError';
  }
}

/** Page or query embedding, or similarity scoring, failed */
export class ScoringError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'SCORING_ERROR', details, options);
    this.name = 'ScoringError';
  }
}

/** A chat-completion call returned an error status or a malformed body */
export class UpstreamError extends PipelineError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'UPSTREAM_ERROR', { statusCode, ...details }, options);
    this.name = 'UpstreamError';
  }
}

/** Generated diagram code raised, timed out, or could not be rendered */
export class ExecutionError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'EXECUTION_ERROR', details, options);
    this.name = 'ExecutionError';
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
