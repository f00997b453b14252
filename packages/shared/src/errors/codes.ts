// ============================================
// treescan Error Codes
// ============================================

/**
 * Centralized error codes.
 * Error code ranges:
 * - 3xxx: Search errors
 */
export enum ErrorCode {
  // Search Errors (3xxx)
  SEARCH_INVALID_ROOT = 3001,
  SEARCH_INVALID_OPTIONS = 3002,
  SEARCH_CANCELED = 3003,
}

/**
 * Whether an error code describes a problem the caller can fix by changing
 * its input (bad options, bad root path).
 */
export function isUserError(code: ErrorCode): boolean {
  switch (code) {
    case ErrorCode.SEARCH_INVALID_ROOT:
    case ErrorCode.SEARCH_INVALID_OPTIONS:
      return true;
    default:
      return false;
  }
}
