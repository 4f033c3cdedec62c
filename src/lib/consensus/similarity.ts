/**
 * Finding identity: same normalized location + description token overlap.
 */

const LINE_SUFFIX = /(?::\d+(?::\d+)?(?:-\d+)?|#L\d+(?:-L?\d+)?)$/i;

/** Lowercased resource path without line/column suffix. */
export function normalizeLocation(location: string): string {
  return location
    .trim()
    .replace(/^`|`$/g, "")
    .replace(/\\/g, "/")
    .replace(/^\.\//, "")
    .replace(LINE_SUFFIX, "")
    .replace(/[.,;:]+$/, "")
    .toLowerCase();
}

function toTokenSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((token) => token.length >= 3)
  );
}

/** Identical text scores 1 even when it has no token to compare. */
export function jaccardSimilarity(a: string, b: string): number {
  const aText = a.trim().toLowerCase();
  if (aText && aText === b.trim().toLowerCase()) return 1;
  const aSet = toTokenSet(a);
  const bSet = toTokenSet(b);
  if (aSet.size === 0 || bSet.size === 0) return 0;
  let intersection = 0;
  for (const token of aSet) {
    if (bSet.has(token)) intersection += 1;
  }
  return intersection / (aSet.size + bSet.size - intersection);
}

export interface Comparable {
  location: string;
  description: string;
}

export function isSameFinding(a: Comparable, b: Comparable, threshold: number): boolean {
  return (
    normalizeLocation(a.location) === normalizeLocation(b.location) &&
    jaccardSimilarity(a.description, b.description) >= threshold
  );
}
