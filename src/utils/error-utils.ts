export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof Reflect.get(error, 'code') === 'string'
  );
}

/**
 * Walks `error.cause` until a string `code` is found. undici wraps socket
 * failures (`fetch failed` → `ECONNREFUSED`), so the code is rarely on the
 * outermost error.
 */
export function findErrorCode(error: unknown, maxDepth = 5): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < maxDepth && current instanceof Error; depth++) {
    if (isSystemError(current)) return current.code;
    current = current.cause;
  }
  return undefined;
}
