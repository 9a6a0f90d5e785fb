/**
 * Glob escaping for Redis SCAN/KEYS MATCH patterns.
 * Metacharacters: *, ?, [, ] and the backslash itself.
 */

const GLOB_SPECIAL = /[*?[\]\\]/g;

/**
 * Escape every glob metacharacter so the pattern matches itself literally.
 */
export function escapeGlob(literal: string): string {
  return literal.replace(GLOB_SPECIAL, (ch) => `\\${ch}`);
}
