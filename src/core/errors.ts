/**
 * Error Classes for ontomod
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_UNKNOWN_DIRECTIVE = "E1001",
  CONFIG_UNKNOWN_INTERMEDIATES = "E1002",
  CONFIG_EMPTY_SEEDS = "E1003",
  CONFIG_INVALID_TABLE_NAME = "E1004",
  CONFIG_SOURCE_NOT_FOUND = "E1005",
  CONFIG_FILE_INVALID = "E1006",

  // Lookup errors (2xxx)
  LOOKUP_FAILED = "E2000",
  LOOKUP_NO_SEEDS_RESOLVED = "E2001",
  LOOKUP_NO_PREDICATES_RESOLVED = "E2002",
  LOOKUP_AMBIGUOUS_LABEL = "E2003",

  // Store errors (3xxx)
  STORE_CONNECTION_FAILED = "E3000",
  STORE_QUERY_FAILED = "E3001",
  STORE_WRITE_FAILED = "E3002",
  STORE_NOT_INITIALIZED = "E3003",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all ontomod errors
 */
export class OntomodError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "OntomodError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid caller input: unknown directives or intermediates policy, empty
 * seed sets, malformed import files. Always raised before anything is written.
 */
export class ConfigError extends OntomodError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Identifier or label resolution failures
 */
export class LookupError extends OntomodError {
  public readonly inputs?: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LOOKUP_FAILED,
    context?: Record<string, unknown> & { inputs?: string[] }
  ) {
    super(message, code, context);
    this.name = "LookupError";
    this.inputs = context?.inputs;
  }
}

/**
 * Backing store failures. Never retried.
 */
export class StoreError extends OntomodError {
  public readonly query?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORE_QUERY_FAILED,
    context?: Record<string, unknown> & { query?: string }
  ) {
    super(message, code, context);
    this.name = "StoreError";
    this.query = context?.query;
  }
}

/**
 * Check if an error is an OntomodError
 */
export function isOntomodError(error: unknown): error is OntomodError {
  return error instanceof OntomodError;
}

/**
 * Wrap an unknown error in an OntomodError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): OntomodError {
  if (isOntomodError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new OntomodError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new OntomodError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}

/**
 * Wrap a driver exception thrown while talking to the backing store
 */
export function wrapStoreError(
  error: unknown,
  message: string,
  query?: string,
  code: ErrorCode = ErrorCode.STORE_QUERY_FAILED
): OntomodError {
  if (isOntomodError(error)) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StoreError(`${message}: ${detail}`, code, {
    query,
    originalError: error instanceof Error ? error.name : undefined,
  });
}
