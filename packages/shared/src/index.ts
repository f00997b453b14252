// ============================================
// treescan Shared Types
// ============================================

// Error codes
export { ErrorCode, isUserError } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, Ok } from "./types/result.js";
