/**
 * Glob matching for include/exclude sets and auto-discovery file patterns
 *
 * Supports `*` (within one path segment), `**` (any number of segments)
 * and `?` (one character). Paths use `/` separators.
 */

const regexCache = new Map<string, RegExp>();

/**
 * Compile a glob pattern into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = regexCache.get(pattern);
  if (cached) return cached;

  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];

    if (char === '*') {
      if (pattern[i + 1] === '*') {
        if (pattern[i + 2] === '/') {
          // `**/` matches zero or more leading directories
          source += '(?:.*/)?';
          i += 3;
        } else {
          source += '.*';
          i += 2;
        }
      } else {
        source += '[^/]*';
        i += 1;
      }
      continue;
    }

    if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
    i += 1;
  }

  const regex = new RegExp(`^${source}$`);
  regexCache.set(pattern, regex);
  return regex;
}

export function matchesGlob(path: string, pattern: string): boolean {
  return globToRegExp(pattern).test(path);
}

export function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesGlob(path, pattern));
}

/**
 * Whether a file name is an auto-discovery candidate: it must match one of
 * the configured patterns, e.g. `_*.py` or `*.*.py`.
 *
 * @param fileName - Bare file name, without directories
 * @param patterns - Ordered pattern list
 */
export function isDiscoveryCandidate(fileName: string, patterns: readonly string[]): boolean {
  return matchesAny(fileName, patterns);
}

/**
 * Apply include/exclude sets to a project-relative path
 */
export function isIncluded(
  path: string,
  include: readonly string[],
  exclude: readonly string[]
): boolean {
  return matchesAny(path, include) && !matchesAny(path, exclude);
}
