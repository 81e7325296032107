/**
 * CORS Origin Matching
 *
 * Allowed origins are patterns where `*` matches any run of characters,
 * e.g. `http://localhost:*` or `chrome-extension://*`.
 *
 * @module server/cors
 */

function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

/**
 * Build an origin resolver for hono/cors.
 *
 * Returns the request origin when it matches a pattern (so credentials
 * can be allowed), otherwise null.
 */
export function createOriginMatcher(patterns: readonly string[]): (origin: string) => string | null {
  const matchers = patterns.map(patternToRegExp);
  return (origin) => (origin && matchers.some((re) => re.test(origin)) ? origin : null);
}
