/**
 * Request path helpers.
 */

const CONSECUTIVE_SLASHES_RE = /\/{2,}/g;

// CR/LF/NUL would split the request; anything else passes through to the session
const INVALID_PATH_RE = /[\r\n\0]/;

/**
 * Canonicalize a request path.
 * Empty becomes "/". Runs of slashes collapse to one, but only before the
 * first "?": the query string is passed through untouched.
 */
export function sanitizePath(path: string): string {
  if (path.length === 0) return "/";

  const queryStart = path.indexOf("?");
  if (queryStart < 0) {
    return path.replace(CONSECUTIVE_SLASHES_RE, "/");
  }
  return path.slice(0, queryStart).replace(CONSECUTIVE_SLASHES_RE, "/") + path.slice(queryStart);
}

/**
 * Validate HTTP path against request splitting.
 */
export function validatePath(path: string): void {
  if (INVALID_PATH_RE.test(path)) {
    throw new Error(`Invalid path: ${JSON.stringify(path)} contains CR/LF/NUL`);
  }
}
