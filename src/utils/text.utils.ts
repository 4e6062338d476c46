/**
 * Text comparison utilities shared by every audio check script.
 * All scripts must normalize identically or their error rates are not comparable.
 */

/**
 * Normalizes text for comparison: lowercase, drop everything outside
 * [a-z0-9] and whitespace, collapse whitespace runs, trim
 * Example: "Hallo, Welt!!" -> "hallo welt"
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Levenshtein distance with unit costs for insertion, deletion and substitution
 */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  if (m === 0) return n;
  if (n === 0) return m;

  const row: number[] = Array.from({ length: n + 1 }, (_, j) => j);
  for (let i = 1; i <= m; i++) {
    let diagonal = row[0];
    row[0] = i;
    for (let j = 1; j <= n; j++) {
      const above = row[j];
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(
        above + 1, // deletion
        row[j - 1] + 1, // insertion
        diagonal + cost // substitution
      );
      diagonal = above;
    }
  }
  return row[n];
}

/**
 * Error rate in [0, 1]: distance relative to the normalized original length.
 * An empty original counts as fully wrong.
 */
export function errorRate(distance: number, normalizedLength: number): number {
  if (normalizedLength <= 0) {
    return 1.0;
  }
  return Math.min(1.0, distance / normalizedLength);
}

/**
 * Error rate of a stored record, computed from its original text
 */
export function recordErrorRate(record: {
  levenshtein_distance: number;
  original_text: string;
}): number {
  return errorRate(
    record.levenshtein_distance,
    normalizeText(record.original_text).length
  );
}
