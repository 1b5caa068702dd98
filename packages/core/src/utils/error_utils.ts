/**
 * Helpers for reading thrown values.
 *
 * Errors raised by Node's fs live in another realm under Jest, so
 * `instanceof Error` is not a reliable test: these look at the shape.
 */

/**
 * The `code` of an errno-style error (`'ENOENT'`, `'EACCES'`, ...).
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
