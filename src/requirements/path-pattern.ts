/**
 * Requirement path patterns.
 *
 * Requirement paths use "/" to group related requirements (`api/cli`,
 * `worker/cli`). A pattern segment that is exactly `*` matches any single
 * segment.
 */

export const PATH_DELIMITER = '/';
export const WILDCARD_SEGMENT = '*';

export function isWildcardPattern(pattern: string): boolean {
  return pattern.split(PATH_DELIMITER).includes(WILDCARD_SEGMENT);
}

/**
 * Check whether a requirement path matches a segment pattern.
 *
 * The pattern may not have more segments than the path, and each pattern
 * segment must be `*` or equal the path segment at the same position.
 * Extra trailing path segments are allowed, so `db` matches `db/models`.
 */
export function matchPattern(pattern: string, path: string): boolean {
  const patternParts = pattern.split(PATH_DELIMITER);
  const pathParts = path.split(PATH_DELIMITER);

  if (patternParts.length > pathParts.length) {
    return false;
  }

  return patternParts.every(
    (part, i) => part === WILDCARD_SEGMENT || part === pathParts[i]
  );
}

/**
 * Filter requirement paths for `list`.
 *
 * A pattern with a `*` segment uses {@link matchPattern}; anything else is a
 * plain string prefix. An empty filter matches everything.
 */
export function matchesFilter(filter: string, path: string): boolean {
  if (filter === '') {
    return true;
  }
  if (isWildcardPattern(filter)) {
    return matchPattern(filter, path);
  }
  return path.startsWith(filter);
}
