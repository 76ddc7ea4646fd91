/**
 * Pattern extractor helper functions
 */

const patternCache = new Map<string, RegExp>();

/**
 * Escape a key so it matches literally inside a regular expression
 * @param key - Assignment key as it appears in the page
 * @returns Regex-safe key
 */
export function escapeKey(key: string): string {
  return key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Get the memoized global matcher for `key = "..."`
 *
 * Compiled on first use per key and reused for every later page. The key is
 * anchored on a word boundary so `PSet` does not match inside `xPSet`, and
 * `PSet0` never matches `PSet` because the `=` must follow the key.
 *
 * @param key - Assignment key
 * @returns Global regex capturing the quoted payload in group 1
 */
export function getAssignmentPattern(key: string): RegExp {
  let pattern = patternCache.get(key);
  if (pattern === undefined) {
    pattern = new RegExp('(?<![\\w$])' + escapeKey(key) + '\\s*=\\s*"([^"]*)"', 'g');
    patternCache.set(key, pattern);
  }
  return pattern;
}

/**
 * Number of matchers compiled so far (for testing/monitoring)
 * @returns Cache size
 */
export function getPatternCacheSize(): number {
  return patternCache.size;
}
