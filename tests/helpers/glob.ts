/**
 * Redis SCAN/KEYS MATCH semantics for the in-memory test store.
 * Supports: *, ?, [abc], [a-z], [^a] and backslash escapes.
 * Unlike path globs, `*` crosses `/` since keys are flat strings.
 */

/**
 * Convert a key glob to an anchored regular expression
 */
export function globToRegex(pattern: string): RegExp {
  let regexStr = '';
  let i = 0;
  const len = pattern.length;

  while (i < len) {
    const char = pattern[i];

    switch (char) {
      case '\\':
        // Escaped character matches itself; a trailing backslash is literal
        if (i + 1 < len) {
          regexStr += escapeRegex(pattern[i + 1]);
          i++;
        } else {
          regexStr += '\\\\';
        }
        break;

      case '*':
        regexStr += '[\\s\\S]*';
        break;

      case '?':
        regexStr += '[\\s\\S]';
        break;

      case '[': {
        const close = findClosingBracket(pattern, i);
        if (close === -1) {
          regexStr += '\\[';
          break;
        }
        regexStr += bracketToRegex(pattern.slice(i + 1, close));
        i = close;
        break;
      }

      default:
        regexStr += escapeRegex(char);
    }

    i++;
  }

  return new RegExp(`^${regexStr}$`);
}

/**
 * Check if a key matches a glob pattern
 */
export function matchGlob(key: string, pattern: string): boolean {
  return globToRegex(pattern).test(key);
}

function findClosingBracket(pattern: string, open: number): number {
  for (let j = open + 1; j < pattern.length; j++) {
    if (pattern[j] === '\\') {
      j++;
      continue;
    }
    if (pattern[j] === ']' && j > open + 1) {
      return j;
    }
  }
  return -1;
}

function bracketToRegex(body: string): string {
  let out = '[';
  let k = 0;
  if (body[0] === '^' || body[0] === '!') {
    out += '^';
    k = 1;
  }
  for (; k < body.length; k++) {
    const ch = body[k];
    if (ch === '\\' && k + 1 < body.length) {
      const escaped = body[k + 1];
      out += /[A-Za-z0-9]/.test(escaped) ? escaped : `\\${escaped}`;
      k++;
    } else if (ch === '-' && k > 0 && k < body.length - 1) {
      out += '-';
    } else {
      out += ch === ']' || ch === '[' || ch === '^' || ch === '-' ? `\\${ch}` : ch;
    }
  }
  return `${out}]`;
}

/**
 * Escape special regex characters
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
