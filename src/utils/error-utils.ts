/**
 * Helpers for turning unknown thrown values into messages.
 */

/**
 * Extracts a string message from any error value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps an error with additional context, keeping the original as `cause`.
 */
export function wrapError(error: unknown, context: string): Error {
  return new Error(`${context}: ${getErrorMessage(error)}`, { cause: error });
}

/** True for errors raised by Node's fs layer (they carry an errno `code`). */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
