/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Tool handlers convert them to structured error responses; the orchestrator
 * converts them to failure envelopes.
 *
 * @module server/errors
 */

import { PipelineError } from '../services/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors and failure envelopes
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Pipeline stage errors
  | 'DOCUMENT_DECODE_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'SCORING_ERROR'
  | 'UPSTREAM_ERROR'
  | 'EXECUTION_ERROR'

  // Page embedding worker errors
  | 'WORKER_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Map error class names that carry no category of their own.
 * PipelineError subclasses are resolved from their `.category` field.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  PythonPoolError: 'WORKER_ERROR',
  ZodError: 'CONFIGURATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof PipelineError) {
      return new MCPError(error.category, error.message, {
        originalName: error.name,
        ...(error.details && { errorDetails: error.details }),
        stack: error.stack,
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'tutor_solve', hint: 'Check parameter types and required fields' },
  DOCUMENT_DECODE_ERROR: {
    tool: 'tutor_solve',
    hint: 'pdf_path must point to a readable, unencrypted PDF',
  },
  SERVICE_UNAVAILABLE: {
    tool: 'tutor_health_check',
    hint: 'Model server did not become healthy in time; check REASONING_BASE_URL / CODEGEN_BASE_URL and retry once it reports ready',
  },
  SCORING_ERROR: {
    tool: 'tutor_health_check',
    hint: 'Check the ColPali worker (python/colpali_worker.py) and GPU memory',
  },
  UPSTREAM_ERROR: {
    tool: 'tutor_health_check',
    hint: 'The model server answered with an error or an unexpected body; check its logs',
  },
  EXECUTION_ERROR: {
    tool: 'tutor_solve',
    hint: 'Generated diagram code failed; inspect circuit_diagram.traceback',
  },
  WORKER_ERROR: {
    tool: 'tutor_health_check',
    hint: 'Check PYTHON_PATH and that colpali_engine and torch are installed',
  },
  PATH_NOT_FOUND: { tool: 'tutor_solve', hint: 'Verify the file path exists on the filesystem' },
  CONFIGURATION_ERROR: {
    tool: 'tutor_health_check',
    hint: 'Check environment variable configuration (see .env.example)',
  },
  INTERNAL_ERROR: { tool: 'tutor_health_check', hint: 'Run tutor_health_check for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error for missing environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

/**
 * Create path not found error
 */
export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}
