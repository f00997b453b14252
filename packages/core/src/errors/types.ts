// ============================================
// treescan Error Types
// ============================================

import { ErrorCode, isUserError } from "@treescan/shared";

export { ErrorCode };

/**
 * Options for creating a SearchError.
 */
export interface SearchErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for failures the engine reports to its caller.
 *
 * Per-file problems never become a SearchError; they are swallowed where they
 * happen. A SearchError means the search could not start or was stopped.
 */
export class SearchError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: SearchErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "SearchError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchError);
    }
  }

  /**
   * Whether the caller can fix this error by changing its input.
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Terminal outcome of a search whose AbortSignal fired.
 * Carried in the Err branch of the search result; it is expected, not a fault.
 */
export class SearchCanceledError extends SearchError {
  constructor(message = "Search canceled", options?: SearchErrorOptions) {
    super(message, ErrorCode.SEARCH_CANCELED, options);
    this.name = "SearchCanceledError";
  }
}

/**
 * Type guard for SearchError.
 */
export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
