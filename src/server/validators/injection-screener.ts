/**
 * Pattern screen for injection-like constructs in candidate SQL.
 *
 * Runs on the raw statement text before any parsing so that comment
 * markers and stacked statements are caught even when the parser would
 * silently drop them.
 */

/**
 * Return the first pattern that matches `sql`, or `null` when none does.
 *
 * Patterns are expected to be compiled case-insensitive and without the
 * global flag, so `test` carries no state between calls.
 */
export function findInjectionPattern(sql: string, patterns: readonly RegExp[]): RegExp | null {
  for (const pattern of patterns) {
    if (pattern.test(sql)) {
      return pattern;
    }
  }
  return null;
}

/** Screen `sql` against the configured patterns. */
export function hasInjectionPattern(sql: string, patterns: readonly RegExp[]): boolean {
  const match = findInjectionPattern(sql, patterns);
  if (match) {
    console.warn(`[SECURITY] Injection pattern /${match.source}/ matched candidate SQL`);
    return true;
  }
  return false;
}
