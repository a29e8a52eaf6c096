/**
 * Pattern Matching Utilities
 *
 * Matching of route patterns and HTTP methods in policy-table rules.
 */

/**
 * Matches a route object against a resource pattern.
 *
 * Pattern Specification:
 * - Segments are delimited by `/`
 * - `*` or `:name` matches any single non-empty segment
 * - A trailing `/*` matches one or more remaining segments
 * - `*` alone matches every object
 * - Anything else must match the segment exactly
 *
 * Objects are route patterns themselves (e.g. `/users/:id`), so a literal
 * `:id` in the object is just a segment that a pattern's `:param` or `*`
 * can match.
 */
export function matchesResourcePattern(pattern: string, object: string): boolean {
  if (pattern === object) return true;
  if (pattern === '*') return true;

  const patternParts = pattern.split('/');
  const objectParts = object.split('/');

  const hasTrailingWildcard = patternParts.length > 1 && patternParts[patternParts.length - 1] === '*';

  if (hasTrailingWildcard) {
    const fixedParts = patternParts.slice(0, -1);
    if (objectParts.length <= fixedParts.length) {
      return false;
    }
    if (!segmentsMatch(fixedParts, objectParts.slice(0, fixedParts.length))) {
      return false;
    }
    return objectParts.slice(fixedParts.length).some((part) => part !== '');
  }

  if (patternParts.length !== objectParts.length) {
    return false;
  }
  return segmentsMatch(patternParts, objectParts);
}

function segmentsMatch(patternParts: string[], objectParts: string[]): boolean {
  return patternParts.every((patternPart, i) => {
    const objectPart = objectParts[i];
    if (patternPart === '*' || (patternPart.startsWith(':') && patternPart.length > 1)) {
      return objectPart !== '';
    }
    return patternPart === objectPart;
  });
}

/**
 * Matches an HTTP method against a rule action. Case-insensitive; `*`
 * matches every method.
 */
export function matchesMethod(pattern: string, method: string): boolean {
  return pattern === '*' || pattern.toUpperCase() === method.toUpperCase();
}
