/**
 * Exit Codes
 *
 * Standardized process exit codes and the mapping from search outcomes to them.
 * Following Unix conventions:
 * - 0: Success
 * - 1: General error
 * - 2: Usage/argument error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import { isSearchError, SearchCanceledError } from "@treescan/core";
import { InvalidArgumentError } from "commander";

// =============================================================================
// Exit Code Constants
// =============================================================================

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

/**
 * Exit code type derived from EXIT_CODES values
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// Exit Code Mapper Class
// =============================================================================

/**
 * Maps thrown errors and search outcomes to process exit codes
 *
 * @example
 * ```typescript
 * try {
 *   await run();
 * } catch (error) {
 *   process.exitCode = ExitCodeMapper.fromException(error);
 * }
 * ```
 */
// biome-ignore lint/complexity/noStaticOnlyClass: ExitCodeMapper provides a logical grouping for exit code mapping
export class ExitCodeMapper {
  /**
   * Map an exception to an exit code
   */
  static fromException(error: unknown): ExitCode {
    // Cancellation, whether reported by the engine or raised by a cooperative check
    if (error instanceof SearchCanceledError) {
      return EXIT_CODES.INTERRUPTED;
    }
    if (error instanceof Error && error.name === "AbortError") {
      return EXIT_CODES.INTERRUPTED;
    }

    if (error instanceof InvalidArgumentError) {
      return EXIT_CODES.USAGE_ERROR;
    }
    if (isSearchError(error) && error.isUserError) {
      return EXIT_CODES.USAGE_ERROR;
    }

    return EXIT_CODES.ERROR;
  }
}
