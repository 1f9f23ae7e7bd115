/**
 * Small helpers for reading unknown thrown values. Errors raised by Node
 * built-ins may come from another realm (Jest's VM sandbox), so fields are
 * read structurally rather than through `instanceof Error`.
 */

export function errorMessage(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function isMissingFileError(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}
