/**
 * MCP Server Error Handling
 *
 * Every failure that reaches a tool handler is turned into an MCPError with
 * a category clients can branch on.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const ERROR_CATEGORIES = [
  // Validation
  'VALIDATION_ERROR',

  // Graph storage
  'DATABASE_NOT_FOUND',
  'DATABASE_ERROR',
  'PATH_NOT_FOUND',

  // Wiki fetches
  'PAGE_FETCH_FAILED',
  'PAGE_FETCH_TIMEOUT',
  'PAGE_NOT_FOUND',

  // Knowledge base
  'QUERY_FAILED',
  'IDENTIFIER_NOT_FOUND',
  'REMOTE_WRITE_REJECTED',
  'WRITER_NOT_CONFIGURED',

  // Internal
  'INTERNAL_ERROR',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

function toCategory(value: unknown): ErrorCategory | undefined {
  return ERROR_CATEGORIES.find((category) => category === value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default category per domain error class. Classes in CODED_ERROR_NAMES carry
 * a `code` that wins over the default when it names a category.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  DatabaseError: 'DATABASE_ERROR',
  MigrationError: 'DATABASE_ERROR',
  GraphFileError: 'VALIDATION_ERROR',
  WikiFetchError: 'PAGE_FETCH_FAILED',
  KnowledgeBaseError: 'QUERY_FAILED',
};

const CODED_ERROR_NAMES = new Set(['DatabaseError', 'GraphFileError', 'WikiFetchError', 'KnowledgeBaseError']);

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const coded =
        CODED_ERROR_NAMES.has(error.name) && 'code' in error ? toCategory(error.code) : undefined;
      const category = coded ?? ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const details = 'details' in error && isRecord(error.details) ? error.details : {};

      return new MCPError(category, error.message, {
        ...details,
        originalName: error.name,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

/**
 * Raised when a write is requested but the host supplied no write client
 */
export function writerNotConfiguredError(): MCPError {
  return new MCPError(
    'WRITER_NOT_CONFIGURED',
    'No knowledge base writer is configured for this session; reconciliation is unavailable.'
  );
}
