/**
 * Core error definitions
 *
 * Every error raised by the pipeline derives from HybridChunkerError and
 * carries a stable code from ErrorCodes plus a context object for logs.
 *
 * Rate-limit denials and open circuits are NOT errors here: they are
 * returned as result values by the limiter and the breaker.
 */

export class HybridChunkerError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HybridChunkerError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Configuration errors (1000-1999)
  INVALID_CONFIG: 'E1000',
  INVALID_PARAMETER: 'E1001',

  // Chunking errors (2000-2999)
  CHUNKING_FAILED: 'E2000',
  MALFORMED_TEXT: 'E2001',
  ARTICLE_TOO_LARGE: 'E2002',

  // Routing errors (3000-3999)
  ROUTING_FAILED: 'E3000',

  // LLM errors (4000-4999)
  LLM_TRANSIENT: 'E4000',
  LLM_FATAL: 'E4001',
  LLM_TIMEOUT: 'E4002',
  LLM_MALFORMED_RESPONSE: 'E4003',

  // Coordination errors (5000-5999)
  COORDINATOR_FAILED: 'E5000',
  JOB_NOT_FOUND: 'E5001',
  COORDINATOR_STOPPED: 'E5002',

  // Storage errors (6000-6999)
  STORAGE_LOAD_FAILED: 'E6000',
  STORAGE_PERSIST_FAILED: 'E6001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Invalid configuration. Raised at startup (or on reload) and never recovered.
 */
export class ConfigurationError extends HybridChunkerError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.INVALID_CONFIG, { ...context, issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Input text the base chunker cannot segment
 */
export class ChunkingError extends HybridChunkerError {
  constructor(
    message: string,
    public readonly articleId: string,
    code: ErrorCode = ErrorCodes.CHUNKING_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, articleId });
    this.name = 'ChunkingError';
  }
}

/**
 * Scoring failure inside the quality router. Callers treat it as "keep".
 */
export class RoutingError extends HybridChunkerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.ROUTING_FAILED, context);
    this.name = 'RoutingError';
  }
}

export type TransientErrorKind = 'rate_limit' | 'timeout' | 'server' | 'network' | 'unknown';
export type FatalErrorKind = 'auth' | 'invalid_request' | 'quota' | 'malformed_response';
export type LLMErrorKind = TransientErrorKind | FatalErrorKind;

/**
 * Retryable failure of a completion call
 */
export class LLMTransientError extends HybridChunkerError {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly kind: TransientErrorKind,
    public readonly provider: string,
    context?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'timeout' ? ErrorCodes.LLM_TIMEOUT : ErrorCodes.LLM_TRANSIENT,
      { ...context, kind, provider }
    );
    this.name = 'LLMTransientError';
  }
}

/**
 * Non-retryable failure of a completion call (auth, bad request, bad reply)
 */
export class LLMFatalError extends HybridChunkerError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly kind: FatalErrorKind,
    public readonly provider: string,
    context?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'malformed_response' ? ErrorCodes.LLM_MALFORMED_RESPONSE : ErrorCodes.LLM_FATAL,
      { ...context, kind, provider }
    );
    this.name = 'LLMFatalError';
  }
}

export type LLMError = LLMTransientError | LLMFatalError;

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMTransientError || error instanceof LLMFatalError;
}

/**
 * The coordinator cannot make progress on a job at all
 */
export class CoordinatorError extends HybridChunkerError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.COORDINATOR_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'CoordinatorError';
  }
}

/**
 * Storage adapter failure
 */
export class StorageError extends HybridChunkerError {
  constructor(
    message: string,
    public readonly operation: 'load' | 'persist',
    context?: Record<string, unknown>
  ) {
    super(
      message,
      operation === 'load' ? ErrorCodes.STORAGE_LOAD_FAILED : ErrorCodes.STORAGE_PERSIST_FAILED,
      { ...context, operation }
    );
    this.name = 'StorageError';
  }
}

/**
 * Create a validation error for a single bad parameter
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): HybridChunkerError {
  return new HybridChunkerError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.INVALID_PARAMETER,
    { field, suggestion }
  );
}

/**
 * Create a job-not-found error
 */
export function createJobNotFoundError(jobId: string): CoordinatorError {
  return new CoordinatorError(`Job not found: ${jobId}`, ErrorCodes.JOB_NOT_FOUND, {
    jobId,
    suggestion: 'Terminal jobs are evicted once their final status has been retrieved',
  });
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
