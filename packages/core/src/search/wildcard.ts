/**
 * Wildcard name matching
 *
 * - `*` matches any run of characters (including none)
 * - `?` matches exactly one character
 * - everything else is literal, compared case-insensitively
 *
 * @module search/wildcard
 */

/**
 * Compiled name predicate.
 */
export type NameMatcher = (name: string) => boolean;

const matchAll: NameMatcher = () => true;

/**
 * Wildcard namespace for pattern matching operations
 */
export namespace Wildcard {
  /**
   * Convert a wildcard pattern to an anchored, case-insensitive RegExp
   *
   * @example
   * ```ts
   * Wildcard.toRegex("*.log")   // matches "app.log", "APP.LOG"
   * Wildcard.toRegex("file?")   // matches "file1", "fileA"
   * ```
   */
  export function toRegex(pattern: string): RegExp {
    // Escape special regex characters except * and ?
    const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&");

    const regexStr = escaped.replace(/\*/g, ".*").replace(/\?/g, ".");

    // "u" so that ? consumes a whole code point, "s" so * spans any character
    return new RegExp(`^${regexStr}$`, "isu");
  }

  /**
   * Whether a pattern constrains anything. Empty and whitespace-only patterns do not.
   */
  export function isEmpty(pattern: string | undefined): boolean {
    return pattern === undefined || pattern.trim().length === 0;
  }

  /**
   * Compile a pattern once into a predicate.
   *
   * An empty pattern yields a predicate that accepts every name. A pattern
   * that cannot be compiled, or a predicate that throws, rejects the name.
   */
  export function compile(pattern: string | undefined): NameMatcher {
    if (pattern === undefined || isEmpty(pattern)) {
      return matchAll;
    }

    let regex: RegExp;
    try {
      regex = toRegex(pattern);
    } catch {
      return () => false;
    }

    return (name: string) => {
      try {
        return regex.test(name);
      } catch {
        return false;
      }
    };
  }

  /**
   * Check if a name matches a wildcard pattern
   *
   * @example
   * ```ts
   * Wildcard.matches("annual_report_final.txt", "*report*.txt") // true
   * Wildcard.matches("ab.log", "?.log")                         // false
   * ```
   */
  export function matches(name: string, pattern: string | undefined): boolean {
    return compile(pattern)(name);
  }
}
