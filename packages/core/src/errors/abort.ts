// ============================================
// Cooperative cancellation helpers
// ============================================

/**
 * Error thrown when a cooperative cancellation check observes an aborted signal.
 */
export class AbortError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortError";

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AbortError);
    }
  }
}

/**
 * Check for an AbortError, including DOM-style aborts raised by Node APIs
 * that accept a signal.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Throw an AbortError if the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError();
  }
}

/**
 * Sleeps for the specified duration with abort signal support.
 *
 * @throws AbortError if the signal is aborted before or during the sleep
 */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);

  return new Promise((resolve, reject) => {
    let abortHandler: (() => void) | undefined;

    const timeoutId = setTimeout(() => {
      if (signal && abortHandler) {
        signal.removeEventListener("abort", abortHandler);
      }
      resolve();
    }, ms);

    if (signal) {
      abortHandler = (): void => {
        clearTimeout(timeoutId);
        reject(new AbortError());
      };

      signal.addEventListener("abort", abortHandler, { once: true });
    }
  });
}
