/**
 * Minimal pattern matcher for behavior patterns.
 *
 * This is not a glob engine: a pattern holds at most one `*`.
 * - no `*`: substring test ("test" matches "my_test.ts")
 * - one `*`: prefix/suffix test ("*.log" matches "error.log")
 * - two or more `*`: never matches
 */
export function matchesPattern(name: string, pattern: string): boolean {
  const parts = pattern.split('*');

  if (parts.length === 1) {
    return name.includes(pattern);
  }

  if (parts.length === 2) {
    const [prefix = '', suffix = ''] = parts;
    // Prefix and suffix may overlap on short names ("ab*ba" matches "aba")
    return name.startsWith(prefix) && name.endsWith(suffix);
  }

  return false;
}
