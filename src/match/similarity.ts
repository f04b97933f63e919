/**
 * Name similarity measures for fuzzy farm matching
 */

/**
 * Pluggable similarity measure; must return a value in [0, 1]
 */
export type SimilarityFn = (a: string, b: string) => number;

/**
 * Case- and whitespace-insensitive key used for strong name equality
 */
export function nameKey(name: string): string {
  return name.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Tokenize a farm name: lowercase, punctuation stripped, split on whitespace
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s&]/g, ' ')
    .split(/\s+/)
    .filter(token => token.length > 0);
}

/**
 * Normalized Levenshtein similarity: 1 - (editDistance / maxLength)
 */
export function levenshteinSimilarity(text1: string, text2: string): number {
  const s1 = nameKey(text1);
  const s2 = nameKey(text2);

  if (s1 === s2) return 1;
  if (s1.length === 0 || s2.length === 0) return 0;

  // Two-row dynamic programming over s2
  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j);
  for (let i = 1; i <= s1.length; i++) {
    const current = [i];
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }

  const distance = previous[s2.length] ?? 0;
  return Math.max(0, 1 - distance / Math.max(s1.length, s2.length));
}

/**
 * Share of the smaller token set found in the larger one.
 * Single-token names score 0 so that "Smith" does not contain-match "Smith Poultry".
 */
export function tokenContainment(text1: string, text2: string): number {
  const tokens1 = new Set(tokenize(text1));
  const tokens2 = new Set(tokenize(text2));
  const [smaller, larger] = tokens1.size <= tokens2.size ? [tokens1, tokens2] : [tokens2, tokens1];

  if (smaller.size < 2) return 0;

  let shared = 0;
  for (const token of smaller) {
    if (larger.has(token)) shared++;
  }
  return shared / smaller.size;
}

export const defaultSimilarity: SimilarityFn = (a, b) =>
  Math.max(levenshteinSimilarity(a, b), tokenContainment(a, b));
