/**
 * @fileoverview Helpers for outbound fetch calls to specialist services.
 */

/**
 * Join a service base address and an operation path, tolerating missing or
 * duplicated slashes on either side.
 */
export function joinUrl(baseAddress: string, path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${baseAddress.replace(/\/+$/, '')}${normalizedPath}`;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }
  return typeof cause.code === 'string' ? cause.code : undefined;
}

/**
 * Describe a failed fetch in one line: timeouts, connection errors (with
 * their undici/system code) and anything else thrown.
 */
export function describeFetchError(error: unknown, timeoutMs: number): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return `timed out after ${timeoutMs}ms`;
  }

  const code = getErrorCode(error);
  return code ? `${error.message} (${code})` : error.message;
}
